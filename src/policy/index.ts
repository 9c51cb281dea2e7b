export { DEFAULT_POLICY, DEFAULT_RUBRIC } from './defaults.js';
export { loadPolicy, parsePolicy, type PolicyFile } from './loader.js';
