import { Command } from 'commander';

export const VERSION = '0.1.0';

export interface CliOptions {
  context: string[];
  key?: string;
  model?: string;
  multiline?: boolean;
  config?: string;
  verbose?: boolean;
}

export type ChatAction = (options: CliOptions) => void | Promise<void>;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(action?: ChatAction): Command {
  const program = new Command();

  program
    .name('colloquy')
    .description('Chat with an OpenAI-compatible model from the terminal')
    .version(VERSION)
    .option('-c, --context <file>', 'Add a file as system context (repeatable)', collect, [])
    .option('-k, --key <key>', 'API key (overrides OPENAI_API_KEY and the config file)')
    .option('-m, --model <model>', 'Model to use (overrides the config file)')
    .option('-l, --multiline', 'Multiline input: Enter adds a line, Ctrl+D sends')
    .option('--config <path>', 'Path to config file')
    .option('-v, --verbose', 'Trace each request on stderr')
    .addHelpText(
      'after',
      `
Inside the chat:
  /q               Quit and print the token and cost summary
  Ctrl+D           End input (or send, in multiline mode)
  Ctrl+C           Clear the current input`,
    );

  if (action) {
    program.action(async () => {
      await action(program.opts<CliOptions>());
    });
  }

  return program;
}
