/**
 * Prompt templates: persona preamble, few-shot examples, live user turn
 */
export type { PromptTemplate, PromptMessage, TemplateType } from './types.js';
export { FewShotTemplate, exampleTurns, renderPrompt } from './FewShotTemplate.js';
export { PersonaTemplate } from './PersonaTemplate.js';
export { SearchTemplate, INTERNET_SEARCH_POLICY } from './SearchTemplate.js';
export { TemplateFactory } from './TemplateFactory.js';
