import { ConversationMessage, MessageRole } from '../../core/entities/Conversation.js';

/**
 * Ordered, append-only message sequence of one session.
 * Messages are frozen when appended.
 */
export class SessionHistory {
  private entries: ConversationMessage[] = [];

  constructor(readonly sessionId: string) {}

  append(
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {}
  ): ConversationMessage {
    const message: ConversationMessage = Object.freeze({
      role,
      content,
      timestamp: new Date(),
      metadata: Object.freeze({ ...metadata }),
    });
    this.entries.push(message);
    return message;
  }

  get messages(): readonly ConversationMessage[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries.length = 0;
  }
}
