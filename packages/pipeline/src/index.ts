export {
  PipelineEngine,
  type PipelineEngineOptions,
} from './core/pipeline-engine';
export {
  Scheduler,
  type EnqueueOptions,
  type SchedulerOptions,
  type SchedulerStatus,
} from './core/scheduler';
export type {
  PipelineRunner,
  PropertyExtractor,
  RunOutcome,
  RunResult,
  TextExtractor,
} from './core/types';
export type { DocumentStore, EligibilityPolicy } from './store/document-store';
export {
  JsonDocumentStore,
  type JsonDocumentStoreOptions,
} from './store/json-document-store';
export { TaskQueue, compareTasks } from './queue/task-queue';
export {
  DocumentIngestor,
  type DocumentIngestorOptions,
  type IngestResult,
} from './ingest/document-ingestor';
export {
  DocumentBusyError,
  DocumentNotFoundError,
  DocumentStoreError,
  IngestionError,
} from './errors/pipeline-errors';
export { SCHEDULER, SUPPORTED_EXTENSIONS, TASK_PRIORITY } from './config/constants';
