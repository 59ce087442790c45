import { z } from 'zod';

export const MessageRoleSchema = z.enum(['system', 'user', 'assistant']);

export type MessageRole = z.infer<typeof MessageRoleSchema>;

/** One role-tagged unit of conversation content, replayed verbatim on every request. */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
}

export class InvalidMessageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMessageError';
  }
}
