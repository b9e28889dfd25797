import { ResponseType } from '../entities/Conversation.js';

/**
 * One message of a rendered prompt
 */
export interface PromptMessage {
  role: 'system' | 'human' | 'ai';
  content: string;
}

/**
 * Template type identifiers
 */
export type TemplateType = 'persona' | 'search';

/**
 * Abstract interface for prompt templates
 * Different templates choose different system preambles around the same few-shot turns
 */
export interface PromptTemplate {
  /**
   * Build the structured prompt
   * @returns null when there is no user input to answer
   */
  buildMessages(
    userInput: string,
    responseType: ResponseType | string,
    personaName: string
  ): PromptMessage[] | null;

  /**
   * Build the prompt rendered as a single text block
   */
  build(userInput: string, responseType: ResponseType | string, personaName: string): string | null;

  /**
   * Get the template name
   */
  getName(): string;
}
