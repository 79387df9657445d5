import type { LoggerMethods } from '@propscan/logger';
import type { LanguageModel } from 'ai';

import type { LoadedConfig } from './config/config-loader';

import {
  DocumentIngestor,
  JsonDocumentStore,
  PipelineEngine,
  Scheduler,
} from '@propscan/pipeline';
import {
  ModelCandidateList,
  PropertyExtractionClient,
} from '@propscan/property-extractor';
import { PropscanError } from '@propscan/shared';
import { TextExtractionClient } from '@propscan/text-extractor';
import { join } from 'node:path';

import { persistModelList } from './config/config-loader';
import { ModelFactory } from './processing/model-factory';

/**
 * Model constructors, replaceable in tests
 */
export interface WorkerModels {
  createOcrModel(): LanguageModel;
  createLlmModel(modelId: string): LanguageModel;
}

export interface WorkerOptions {
  logger: LoggerMethods;
  loaded: LoadedConfig;
  models?: WorkerModels;
}

/**
 * Fully wired pipeline for one process
 */
export interface Worker {
  store: JsonDocumentStore;
  ingestor: DocumentIngestor;
  candidates: ModelCandidateList;
  engine: PipelineEngine;
  scheduler: Scheduler;
}

export const DATABASE_FILE = 'documents.json';
export const UPLOAD_DIR = 'uploads';

/**
 * Build the store, clients, engine and scheduler from a loaded config.
 *
 * Edits to the candidate list are written back to the config file.
 */
export function createWorker(options: WorkerOptions): Worker {
  const { logger, loaded } = options;
  const { config, configPath, dataDir } = loaded;
  const models = options.models ?? new ModelFactory(config);
  const uploadDir = join(dataDir, UPLOAD_DIR);

  if (!config.llm.apiKey) {
    logger.warn('[Worker] No LLM API key configured; set LLM_API_KEY');
  }

  const store = new JsonDocumentStore({ dbPath: join(dataDir, DATABASE_FILE) });

  const candidates = new ModelCandidateList(config.llm.models);
  candidates.onChange((modelIds) => {
    try {
      persistModelList(configPath, modelIds);
      logger.info(`[Worker] Saved model list: ${modelIds.join(', ') || '(empty)'}`);
    } catch (error) {
      logger.error(
        `[Worker] Could not save model list: ${PropscanError.getErrorMessage(error)}`,
      );
    }
  });

  const textExtractor = new TextExtractionClient({
    logger,
    model: models.createOcrModel(),
    timeoutMs: config.ocr.timeoutMs,
    pageConcurrency: config.ocr.pageConcurrency,
  });

  const propertyExtractor = new PropertyExtractionClient({
    logger,
    candidates,
    resolveModel: (modelId) => models.createLlmModel(modelId),
    cooldownMs: config.llm.cooldownMs,
    minMeaningfulFields: config.llm.minMeaningfulFields,
    timeoutMs: config.llm.timeoutMs,
  });

  const engine = new PipelineEngine({
    logger,
    store,
    textExtractor,
    propertyExtractor,
    uploadDir,
    retryLimit: config.pipeline.retryLimit,
  });

  const scheduler = new Scheduler({
    logger,
    store,
    engine,
    concurrency: config.pipeline.concurrency,
    batchSize: config.pipeline.batchSize,
    pollIntervalMs: config.pipeline.pollIntervalMs,
    retryLimit: config.pipeline.retryLimit,
    attemptLimit: config.pipeline.attemptLimit,
    softFailureLimit: config.pipeline.softFailureLimit,
  });

  const ingestor = new DocumentIngestor({ logger, store, uploadDir });

  return { store, ingestor, candidates, engine, scheduler };
}
