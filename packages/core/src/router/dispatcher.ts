import type { Message } from '../conversation/types.js';
import { classifyResponse } from './classifier.js';
import { TransportError } from './errors.js';
import { recoverable, type Outcome } from './outcome.js';

export const DEFAULT_ENDPOINT = 'https://api.openai.com/v1';
export const DEFAULT_TIMEOUT_MS = 600_000;

/** Per-request slice of the configuration. */
export interface ChatSettings {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens?: number;
}

export interface ChatRequestBody {
  model: string;
  temperature: number;
  messages: Array<{ role: Message['role']; content: string }>;
  max_tokens?: number;
}

export interface DispatchInfo {
  url: string;
  model: string;
  messageCount: number;
}

export interface DispatcherOptions {
  /** Base URL of the API, without the `/chat/completions` path. */
  endpoint?: string;
  /** Transport timeout per request; there is no other cancellation. */
  timeoutMs?: number;
  fetch?: typeof globalThis.fetch;
  /** Called before each request is sent. */
  onRequest?: (info: DispatchInfo) => void;
}

export function buildRequestBody(messages: readonly Message[], settings: ChatSettings): ChatRequestBody {
  const body: ChatRequestBody = {
    model: settings.model,
    temperature: settings.temperature,
    messages: messages.map(m => ({ role: m.role, content: m.content })),
  };
  if (settings.maxTokens !== undefined) {
    body.max_tokens = settings.maxTokens;
  }
  return body;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function describeTransportFailure(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
  return `${error.message}${cause}`;
}

/**
 * Sends the conversation to `POST {endpoint}/chat/completions` and classifies
 * what comes back. It never touches the conversation or the usage totals;
 * applying the outcome is the caller's job.
 */
export class RequestDispatcher {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof globalThis.fetch;
  private readonly onRequest?: (info: DispatchInfo) => void;

  constructor(options: DispatcherOptions = {}) {
    const endpoint = (options.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, '');
    this.url = `${endpoint}/chat/completions`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.onRequest = options.onRequest;
  }

  get endpointUrl(): string {
    return this.url;
  }

  async send(snapshot: readonly Message[], settings: ChatSettings): Promise<Outcome> {
    const body = buildRequestBody(snapshot, settings);
    this.onRequest?.({ url: this.url, model: body.model, messageCount: body.messages.length });

    let status: number;
    let text: string;
    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${settings.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const timedOut = isTimeout(error);
      return recoverable(new TransportError(
        timedOut
          ? `Request timed out after ${this.timeoutMs}ms`
          : `Connection failed: ${describeTransportFailure(error)}`,
        timedOut,
        { cause: error },
      ));
    }

    return classifyResponse(status, text);
  }
}
