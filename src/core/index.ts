export { WorkerPool, TaskHandle } from "./pool.js";
export type { WorkerPoolOptions } from "./pool.js";
export { runBatch } from "./dispatcher.js";
export type { RunBatchOptions } from "./dispatcher.js";
export { executeItem, withResource, fileProcessor } from "./processor.js";
export type { FileTransform, FileTransformContext, FileProcessorOptions } from "./processor.js";
export { listFiles } from "./enumerator.js";
export type { ListOptions } from "./enumerator.js";
export {
  ItemProcessingError,
  PoolClosedError,
  DuplicateItemError,
  InvalidConfigurationError,
  AggregationError,
} from "./errors.js";
export {
  createWorkItem,
  success,
  failure,
  cancelled,
  isSuccess,
  isFailure,
  isCancelled,
  summarizeOutcomes,
} from "./types.js";
export type { WorkItem, Outcome, OutcomeStatus, Processor, BatchSummary } from "./types.js";
