export {
  type Message,
  type MessageRole,
  MessageRoleSchema,
  InvalidMessageError,
} from './types.js';

export {
  type SeedOptions,
  FORMAT_DIRECTIVE,
  ConversationStore,
  seedConversation,
} from './store.js';
