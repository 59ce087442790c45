import { z } from 'zod';
import { MessageRoleSchema } from '../conversation/types.js';
import {
  AuthenticationError,
  ContextLengthExceededError,
  InvalidRequestError,
  MalformedErrorBodyError,
  MalformedResponseError,
  RateLimitOrQuotaError,
  UnknownStatusError,
  UpstreamOverloadError,
  type ContextLengthDetail,
} from './errors.js';
import { fatal, recoverable, success, type Outcome } from './outcome.js';

export const CONTEXT_LENGTH_EXCEEDED = 'context_length_exceeded';

const CONTEXT_LENGTH_PATTERN =
  /maximum context length is (\d+) tokens[\s\S]*?resulted in (\d+) tokens/;

const CompletionBodySchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      role: MessageRoleSchema,
      content: z.string().min(1),
    }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().int().nonnegative(),
    completion_tokens: z.number().int().nonnegative(),
  }),
});

const ErrorBodySchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.string().nullable().optional(),
  }),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull the limit and the submitted size out of a context-length error message,
 * e.g. "maximum context length is 4096 tokens ... resulted in 4500 tokens".
 */
export function parseContextLengthMessage(text: string): ContextLengthDetail | null {
  const match = CONTEXT_LENGTH_PATTERN.exec(text);
  if (!match) return null;
  const maxTokens = parseInt(match[1], 10);
  const sentTokens = parseInt(match[2], 10);
  return { maxTokens, sentTokens, overage: sentTokens - maxTokens };
}

function classifySuccess(body: string): Outcome {
  const json = parseJson(body);
  if (json === undefined) {
    return fatal(new MalformedResponseError('body is not JSON', body));
  }
  const parsed = CompletionBodySchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    return fatal(new MalformedResponseError(issues, body));
  }
  const { message } = parsed.data.choices[0];
  return success(
    { role: message.role, content: message.content },
    {
      promptTokens: parsed.data.usage.prompt_tokens,
      completionTokens: parsed.data.usage.completion_tokens,
    },
  );
}

function classifyBadRequest(body: string): Outcome {
  const parsed = ErrorBodySchema.safeParse(parseJson(body));
  if (!parsed.success) {
    return fatal(new MalformedErrorBodyError(body));
  }
  const { code, message } = parsed.data.error;
  if (code === CONTEXT_LENGTH_EXCEEDED) {
    return fatal(new ContextLengthExceededError(parseContextLengthMessage(message), body));
  }
  return fatal(new InvalidRequestError(code ?? null, message, body));
}

/**
 * Map an HTTP status and response body to an {@link Outcome}.
 *
 * | status   | outcome                                   |
 * |----------|-------------------------------------------|
 * | 200      | success                                   |
 * | 400      | fatal (context length / invalid / malformed) |
 * | 401      | fatal                                     |
 * | 429      | recoverable                               |
 * | 502, 503 | recoverable                               |
 * | other    | fatal                                     |
 */
export function classifyResponse(status: number, body: string): Outcome {
  switch (status) {
    case 200:
      return classifySuccess(body);
    case 400:
      return classifyBadRequest(body);
    case 401:
      return fatal(new AuthenticationError(body));
    case 429:
      return recoverable(new RateLimitOrQuotaError(body));
    case 502:
    case 503:
      return recoverable(new UpstreamOverloadError(status, body));
    default:
      return fatal(new UnknownStatusError(status, body));
  }
}
