import { HistoryEntry, ResponseType } from '../../core/entities/Conversation.js';
import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { SessionHistory } from './SessionHistory.js';

export interface ConversationManagerOptions {
  archive?: IConversationRepository;
  logger?: Logger;
}

/**
 * UI-facing mirror of one session's conversation
 */
export class ConversationManager {
  private readonly messages: SessionHistory;
  private responseStyle: ResponseType = 'standard';
  private readonly logger: Logger;
  // Read from the archive on first write so a recreated manager appends after earlier turns
  private nextArchiveIndex: number | null = null;

  constructor(
    readonly sessionId: string,
    private options: ConversationManagerOptions = {}
  ) {
    this.messages = new SessionHistory(sessionId);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Add a user message, tagged with the current response style
   */
  addUserMessage(content: string): void {
    this.messages.append('user', content, { response_type: this.responseStyle });
    this.archive('user', content, { response_type: this.responseStyle });
  }

  /**
   * Add an assistant message to the conversation
   */
  addAssistantMessage(content: string, metadata: Record<string, unknown> = {}): void {
    this.messages.append('assistant', content, metadata);
    this.archive('assistant', content, metadata);
  }

  /**
   * Conversation history in the format served to UI clients
   */
  history(): HistoryEntry[] {
    return this.messages.messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
      timestamp: msg.timestamp.toISOString(),
    }));
  }

  getMessages(): SessionHistory {
    return this.messages;
  }

  /**
   * Empty the conversation. There is no undo.
   */
  clear(): void {
    this.messages.clear();

    if (this.options.archive) {
      try {
        this.options.archive.clearHistory(this.sessionId);
        this.nextArchiveIndex = null;
      } catch (error) {
        this.logger.error('Error clearing archived conversation', {
          session_id: this.sessionId,
          error,
        });
      }
    }
  }

  /**
   * Style applied to user messages added from now on
   */
  setResponseStyle(style: ResponseType): void {
    this.responseStyle = style;
  }

  getResponseStyle(): ResponseType {
    return this.responseStyle;
  }

  private archive(role: string, content: string, metadata: Record<string, unknown>): void {
    if (!this.options.archive) {
      return;
    }

    try {
      const archive = this.options.archive;
      const index = this.nextArchiveIndex ?? archive.getNextMessageIndex(this.sessionId);
      archive.saveMessage(this.sessionId, index, role, content, metadata);
      this.nextArchiveIndex = index + 1;
    } catch (error) {
      this.logger.error(`Error saving ${role} message to archive`, {
        session_id: this.sessionId,
        error,
      });
    }
  }
}
