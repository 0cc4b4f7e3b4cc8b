export {
  InferenceRouter,
  parseArtifact,
  type Generator,
  type GenerateOptions,
  type InferenceBackend,
  type InferenceRouterOptions
} from './router.js';
export { DESIGN_SYSTEM_PROMPT, buildDesignPrompt } from './prompt.js';
