#!/usr/bin/env node

import chalk from 'chalk';
import type { DispatchInfo, TurnSource } from '@colloquy/core';
import { API_KEY_ENV_VAR, ConfigError, loadConfigWithMeta, type Config } from './config/index.js';
import { ContextFileError, readContextFiles, type ContextFile } from './context/files.js';
import { createProgram, type CliOptions } from './program.js';
import { TerminalOutput, formatContextNotice } from './chat/output.js';
import { InkTurnSource, StreamTurnSource } from './chat/prompt.js';
import { exitCodeFor, runChat } from './chat/run.js';

function loadSettings(options: CliOptions): Config {
  const { config, configPath, initialized, apiKeySource } = loadConfigWithMeta(
    { configPath: options.config },
    { apiKey: options.key, model: options.model, multiline: options.multiline },
  );

  if (initialized) {
    console.error(chalk.blue(`New config file initialized: ${configPath}`));
  }

  if (apiKeySource === 'none') {
    throw new ConfigError(
      `No API key found. Set api_key in ${configPath}, export ${API_KEY_ENV_VAR}, or pass --key.`,
    );
  }

  return config;
}

function printBanner(contextFiles: readonly ContextFile[]): void {
  const width = Math.min(process.stdout.columns ?? 80, 80);
  console.log(chalk.bold('colloquy: activated'));
  for (const file of contextFiles) {
    console.log(chalk.dim(formatContextNotice(file)));
  }
  console.log(chalk.dim('─'.repeat(width)));
}

function traceRequest(info: DispatchInfo): void {
  console.error(chalk.dim(`→ POST ${info.url} (${info.model}, ${info.messageCount} messages)`));
}

async function chat(options: CliOptions): Promise<void> {
  let config: Config;
  let contextFiles: ContextFile[];
  try {
    config = loadSettings(options);
    contextFiles = readContextFiles(options.context);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`Config error: ${error.message}`));
      process.exitCode = 1;
      return;
    }
    if (error instanceof ContextFileError) {
      console.error(chalk.red(error.message));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  printBanner(contextFiles);

  const input: TurnSource = process.stdin.isTTY
    ? new InkTurnSource({ multiline: config.multiline })
    : new StreamTurnSource(process.stdin);

  const result = await runChat({
    config,
    contextFiles,
    input,
    output: new TerminalOutput({ markdown: config.markdown, width: process.stdout.columns }),
    onRequest: options.verbose ? traceRequest : undefined,
  });

  process.exitCode = exitCodeFor(result);
}

createProgram(chat)
  .parseAsync(process.argv)
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
