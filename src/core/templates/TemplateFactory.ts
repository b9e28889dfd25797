import { PromptTemplate, TemplateType } from './types.js';
import { PersonaTemplate } from './PersonaTemplate.js';
import { SearchTemplate } from './SearchTemplate.js';

/**
 * Factory for prompt templates
 */
export class TemplateFactory {
  private static templates: Map<TemplateType, PromptTemplate> = new Map<TemplateType, PromptTemplate>([
    ['persona', new PersonaTemplate()],
    ['search', new SearchTemplate()],
  ]);

  /**
   * Get a template instance by type
   */
  static getTemplate(type: TemplateType): PromptTemplate {
    const template = this.templates.get(type);
    if (!template) {
      throw new Error(`Unknown template type: ${type}`);
    }
    return template;
  }
}
