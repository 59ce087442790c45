import {
  ConversationStore,
  RequestDispatcher,
  SessionLoop,
  UsageTracker,
  seedConversation,
  type ChatSettings,
  type DispatchInfo,
  type SessionOutput,
  type SessionResult,
  type TurnSource,
} from '@colloquy/core';
import type { Config } from '../config/index.js';
import type { ContextFile } from '../context/files.js';

export interface RunChatOptions {
  config: Config;
  contextFiles?: readonly ContextFile[];
  input: TurnSource;
  output: SessionOutput;
  fetch?: typeof fetch;
  onRequest?: (info: DispatchInfo) => void;
}

export function toChatSettings(config: Config): ChatSettings {
  return {
    apiKey: config.api_key,
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.max_tokens,
  };
}

/** Seed a fresh conversation from the config and context files, then run the loop to completion. */
export async function runChat(options: RunChatOptions): Promise<SessionResult> {
  const { config, contextFiles = [], input, output } = options;

  const store = new ConversationStore();
  seedConversation(store, {
    formatDirective: config.markdown,
    contextBlocks: contextFiles.map(file => file.content),
  });

  const dispatcher = new RequestDispatcher({
    endpoint: config.endpoint,
    timeoutMs: config.timeout_ms,
    fetch: options.fetch,
    onRequest: options.onRequest,
  });

  const loop = new SessionLoop({
    store,
    usage: new UsageTracker(),
    dispatcher,
    input,
    output,
    settings: () => toChatSettings(config),
  });

  return loop.run();
}

/** 0 for a clean quit or end of input with a priced summary, 1 otherwise. */
export function exitCodeFor(result: SessionResult): number {
  if (result.reason === 'fatal') return 1;
  return result.summary ? 0 : 1;
}
