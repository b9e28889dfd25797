import { ResponseType } from '../entities/Conversation.js';
import { FewShotTemplate } from './FewShotTemplate.js';

/**
 * Persona prompt: one system line per response style
 */
export class PersonaTemplate extends FewShotTemplate {
  protected systemPreamble(responseType: ResponseType, personaName: string): string {
    switch (responseType) {
      case 'creative':
        return `You are ${personaName}, an imaginative AI assistant. Be creative and think outside the box while responding.`;
      case 'factual':
        return `You are ${personaName}, a precise AI assistant. Stick to verified facts only. If unsure, explicitly state that.`;
      case 'standard':
        return `You are ${personaName}, a helpful AI assistant.`;
    }
  }

  getName(): string {
    return 'Persona (few-shot)';
  }
}
