import { ResponseType, parseResponseType } from '../entities/Conversation.js';
import { PromptMessage, PromptTemplate } from './types.js';

/**
 * Illustrative turns placed between the system preamble and the live user turn
 */
export function exampleTurns(personaName: string): Array<[human: string, ai: string]> {
  return [
    [
      'Can you introduce yourself?',
      `Of course! I'm ${personaName}, your friendly AI helper. I'm here to answer your questions and assist you.`,
    ],
    [
      'What can you do for me?',
      'I can answer your questions, help you brainstorm ideas, and explain concepts in simple terms.',
    ],
    [
      'Tell me something fun about AI.',
      'Sure! Did you know some AIs can generate music or art, almost like human creativity?',
    ],
  ];
}

const ROLE_LABELS: Record<PromptMessage['role'], string> = {
  system: 'System',
  human: 'Human',
  ai: 'AI',
};

/**
 * Render messages as labelled lines:
 *
 * System: You are Nova, a helpful AI assistant.
 * Human: Can you introduce yourself?
 * AI: Of course! ...
 * Human: <user input>
 */
export function renderPrompt(messages: PromptMessage[]): string {
  return messages.map((msg) => `${ROLE_LABELS[msg.role]}: ${msg.content}`).join('\n');
}

/**
 * Shared structure: system preamble, three example turns, then the user turn
 */
export abstract class FewShotTemplate implements PromptTemplate {
  protected abstract systemPreamble(responseType: ResponseType, personaName: string): string;

  abstract getName(): string;

  buildMessages(
    userInput: string,
    responseType: ResponseType | string,
    personaName: string
  ): PromptMessage[] | null {
    if (!userInput || userInput.trim().length === 0) {
      return null;
    }

    const messages: PromptMessage[] = [
      { role: 'system', content: this.systemPreamble(parseResponseType(responseType), personaName) },
    ];

    for (const [human, ai] of exampleTurns(personaName)) {
      messages.push({ role: 'human', content: human }, { role: 'ai', content: ai });
    }

    messages.push({ role: 'human', content: userInput });
    return messages;
  }

  build(userInput: string, responseType: ResponseType | string, personaName: string): string | null {
    const messages = this.buildMessages(userInput, responseType, personaName);
    return messages ? renderPrompt(messages) : null;
  }
}
