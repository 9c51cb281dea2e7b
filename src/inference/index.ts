export {
  InferenceRouter,
  InferenceError,
  type InferenceBackend,
  type InferenceRouterOptions,
  type GenerateOptions,
  type GenerationClient
} from './router.js';
export { parseStructured, extractJson, type ParseResult } from './structured.js';
