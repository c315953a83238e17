export {
  RequestPipeline,
  type ExecuteOptions,
  type PipelineResult,
  type RequestPipelineDeps,
} from './request-pipeline.js';

export { executeBatch, type BatchOptions, type BatchResult } from './batch.js';
