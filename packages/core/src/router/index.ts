export {
  type PricingEntry,
  PRICING_TABLE,
  UnknownModelPricingError,
  isPricedModel,
  getModelPricing,
  calculateExpense,
  formatExpense,
} from './pricing.js';

export {
  type UsageDelta,
  type UsageSummary,
  UsageTracker,
} from './usage.js';

export {
  type ContextLengthDetail,
  type RecoverableError,
  type FatalError,
  ChatServiceError,
  TransportError,
  RateLimitOrQuotaError,
  UpstreamOverloadError,
  AuthenticationError,
  ContextLengthExceededError,
  InvalidRequestError,
  MalformedErrorBodyError,
  MalformedResponseError,
  UnknownStatusError,
} from './errors.js';

export {
  type Outcome,
  success,
  recoverable,
  fatal,
} from './outcome.js';

export {
  CONTEXT_LENGTH_EXCEEDED,
  classifyResponse,
  parseContextLengthMessage,
} from './classifier.js';

export {
  type ChatSettings,
  type ChatRequestBody,
  type DispatchInfo,
  type DispatcherOptions,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT_MS,
  RequestDispatcher,
  buildRequestBody,
} from './dispatcher.js';
