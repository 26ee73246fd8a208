export { loadTemplate, injectTopic, validateTemplate } from './prompt-template.js';
export { cleanPost } from './post-cleaner.js';
export {
  OpenAIGenerator,
  createOpenAIGenerator,
  DEFAULT_SYSTEM_PROMPT,
  type OpenAIGeneratorOptions,
} from './openai-generator.js';
