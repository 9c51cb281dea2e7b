export { Pipeline, type PipelineOptions, type BlockCallback, type FlagCallback } from './orchestrator.js';
