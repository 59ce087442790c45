import { MessageRoleSchema, InvalidMessageError, type Message } from './types.js';

/**
 * Instruction asking the model to fence code with language tags and to emit
 * tables as Markdown, so the terminal renderer can format them.
 */
export const FORMAT_DIRECTIVE =
  'Always use code blocks with the appropriate language tags. If asked for a table always format it using Markdown syntax.';

/**
 * Ordered message ledger sent to the service on every turn.
 *
 * Messages are frozen on append. The store is only ever changed by the
 * session loop, after a request outcome is known.
 */
export class ConversationStore {
  private readonly messages: Message[] = [];

  get size(): number {
    return this.messages.length;
  }

  append(message: Message): void {
    if (!MessageRoleSchema.safeParse(message.role).success) {
      throw new InvalidMessageError(`Unknown message role: ${String(message.role)}`);
    }
    if (message.content.length === 0) {
      throw new InvalidMessageError(`Empty ${message.role} message`);
    }
    this.messages.push(Object.freeze({ role: message.role, content: message.content }));
  }

  /** Remove and return the most recently appended message. */
  rollbackLast(): Message | undefined {
    return this.messages.pop();
  }

  snapshot(): readonly Message[] {
    return Object.freeze([...this.messages]);
  }
}

export interface SeedOptions {
  /** Append {@link FORMAT_DIRECTIVE} as the first system message. */
  formatDirective?: boolean;
  /** Extra system context, appended in order after the directive. */
  contextBlocks?: readonly string[];
}

/**
 * Prime a fresh store with the system messages that precede the first user turn.
 * Blank context blocks are skipped.
 */
export function seedConversation(store: ConversationStore, options: SeedOptions = {}): void {
  if (store.size > 0) {
    throw new InvalidMessageError('Conversation already started; system context must come first');
  }
  if (options.formatDirective) {
    store.append({ role: 'system', content: FORMAT_DIRECTIVE });
  }
  for (const block of options.contextBlocks ?? []) {
    const content = block.trim();
    if (content) {
      store.append({ role: 'system', content });
    }
  }
}
