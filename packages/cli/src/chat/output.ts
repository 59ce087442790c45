import { Chalk, type ChalkInstance } from 'chalk';
import {
  AuthenticationError,
  ContextLengthExceededError,
  InvalidRequestError,
  MalformedErrorBodyError,
  MalformedResponseError,
  RateLimitOrQuotaError,
  TransportError,
  UnknownModelPricingError,
  UnknownStatusError,
  UpstreamOverloadError,
  type ChatServiceError,
  type Message,
  type SessionOutput,
  type UsageSummary,
} from '@colloquy/core';
import type { ContextFile } from '../context/files.js';
import { renderReply } from './utils/renderMarkdown.js';

export interface FailureReport {
  headline: string;
  /** Response body to show under the headline. */
  detail?: string;
}

/** Pretty-print a JSON body; anything else is shown as received. */
export function formatRawBody(raw: string | undefined): string {
  if (!raw) return '(empty response body)';
  try {
    return JSON.stringify(JSON.parse(raw), null, 2);
  } catch {
    return raw;
  }
}

export function describeFailure(error: ChatServiceError | UnknownModelPricingError): FailureReport {
  if (error instanceof UnknownModelPricingError) {
    return { headline: `No pricing configured for model "${error.model}"` };
  }
  if (error instanceof TransportError) {
    return { headline: error.timedOut ? 'Connection timed out, try again...' : 'Connection error, try again...' };
  }
  if (error instanceof RateLimitOrQuotaError) {
    return { headline: 'Rate limit or maximum monthly limit exceeded' };
  }
  if (error instanceof UpstreamOverloadError) {
    return { headline: 'The server seems to be overloaded, try again' };
  }
  if (error instanceof AuthenticationError) {
    return { headline: 'Invalid API Key' };
  }
  if (error instanceof ContextLengthExceededError) {
    const { detail } = error;
    if (!detail) return { headline: 'Maximum context length exceeded.' };
    return {
      headline:
        `Maximum context length (${detail.maxTokens}) exceeded. ` +
        `Try reducing ${detail.overage} from the source total (${detail.sentTokens})`,
    };
  }
  if (error instanceof InvalidRequestError) {
    return { headline: 'Invalid request please review API response:', detail: formatRawBody(error.rawBody) };
  }
  if (error instanceof MalformedErrorBodyError) {
    return {
      headline: 'Invalid request and could not find error details in API response:',
      detail: formatRawBody(error.rawBody),
    };
  }
  if (error instanceof MalformedResponseError) {
    return { headline: 'Unexpected response from the API:', detail: formatRawBody(error.rawBody) };
  }
  if (error instanceof UnknownStatusError) {
    return { headline: `Unknown error, status code ${error.status}`, detail: formatRawBody(error.rawBody) };
  }
  return { headline: error.message };
}

export function formatSummary(summary: UsageSummary): string {
  return `[${summary.totalTokens}] $${summary.cost}`;
}

/** Banner line for a context file. Blank files are not sent, and say so. */
export function formatContextNotice(file: ContextFile): string {
  return file.content.trim()
    ? `Context file: ${file.name}`
    : `Context file: ${file.name} (empty, skipped)`;
}

export interface TerminalOutputOptions {
  markdown: boolean;
  /** Terminal width for Markdown layout. */
  width?: number;
  write?: (text: string) => void;
  writeError?: (text: string) => void;
  chalk?: ChalkInstance;
}

/** Prints replies, diagnostics and the closing usage line. */
export class TerminalOutput implements SessionOutput {
  private readonly write: (text: string) => void;
  private readonly writeError: (text: string) => void;
  private readonly chalk: ChalkInstance;

  constructor(private readonly options: TerminalOutputOptions) {
    this.write = options.write ?? ((text) => process.stdout.write(text));
    this.writeError = options.writeError ?? ((text) => process.stderr.write(text));
    this.chalk = options.chalk ?? new Chalk();
  }

  reply(message: Message): void {
    const body = renderReply(message.content, { markdown: this.options.markdown, width: this.options.width });
    this.write(`\n${body}\n\n`);
  }

  failure(error: ChatServiceError): void {
    this.report(describeFailure(error));
  }

  summary(summary: UsageSummary): void {
    this.write(`\n${this.chalk.green.bold(formatSummary(summary))}\n`);
  }

  summaryFailure(error: UnknownModelPricingError): void {
    this.report(describeFailure(error));
  }

  private report({ headline, detail }: FailureReport): void {
    this.writeError(`${this.chalk.red.bold(headline)}\n`);
    if (detail) {
      this.writeError(`${detail}\n`);
    }
  }
}
