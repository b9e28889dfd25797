/**
 * Conversation domain entities
 */
export type MessageRole = 'user' | 'assistant';

export type ResponseType = 'standard' | 'creative' | 'factual';

export const RESPONSE_TYPES: readonly ResponseType[] = ['standard', 'creative', 'factual'];

/**
 * Falls back to 'standard' for anything that is not a known response style
 */
export function parseResponseType(value: unknown): ResponseType {
  return RESPONSE_TYPES.find((type) => type === value) ?? 'standard';
}

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: Date;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Shape handed to UI clients
 */
export interface HistoryEntry {
  role: MessageRole;
  content: string;
  timestamp: string;
}

export interface ConversationMessageRecord {
  id?: number;
  session_id: string;
  message_index: number;
  role: string;
  content: string;
  metadata?: string | null;
  created_at?: string;
}
