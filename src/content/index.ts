export {
  StaticContentGenerator,
  loadPromptCatalogue,
  renderTemplate,
  DEFAULT_PROMPTS_URL,
  type PromptCatalogue,
} from './static-generator.js';
