import React from 'react';
import { render } from 'ink';
import { createInterface } from 'node:readline';
import type { PromptInfo, TurnSource } from '@colloquy/core';
import { LinePrompt } from './components/LinePrompt.js';

export interface InkTurnSourceOptions {
  multiline: boolean;
  stdin?: NodeJS.ReadStream;
  stdout?: NodeJS.WriteStream;
}

/**
 * Reads each turn from the terminal with a short-lived ink prompt.
 * The prompt is unmounted after every turn so replies print below it.
 */
export class InkTurnSource implements TurnSource {
  constructor(private readonly options: InkTurnSourceOptions) {}

  next({ totalTokens }: PromptInfo): Promise<string | null> {
    return new Promise((resolve, reject) => {
      let settled = false;

      const settle = (value: string | null) => {
        if (settled) return;
        settled = true;
        instance.unmount();
        instance.waitUntilExit().then(() => resolve(value), reject);
      };

      const instance = render(
        React.createElement(LinePrompt, {
          totalTokens,
          multiline: this.options.multiline,
          onSubmit: (text: string) => settle(text),
          onEnd: () => settle(null),
        }),
        {
          // an explicit undefined would replace ink's process stream defaults
          ...(this.options.stdin ? { stdin: this.options.stdin } : {}),
          ...(this.options.stdout ? { stdout: this.options.stdout } : {}),
          exitOnCtrlC: false,
        },
      );
    });
  }
}

/** One turn per line from a non-interactive stream such as a pipe. */
export class StreamTurnSource implements TurnSource {
  private readonly lines: AsyncIterator<string>;

  constructor(input: NodeJS.ReadableStream) {
    this.lines = createInterface({ input, crlfDelay: Infinity })[Symbol.asyncIterator]();
  }

  async next(_prompt: PromptInfo): Promise<string | null> {
    const { value, done } = await this.lines.next();
    return done ? null : value;
  }
}
