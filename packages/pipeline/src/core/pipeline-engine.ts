import type { LoggerMethods } from '@propscan/logger';
import type { Document, PipelineStage } from '@propscan/model';

import type { DocumentStore } from '../store/document-store';
import type {
  PipelineRunner,
  PropertyExtractor,
  RunOutcome,
  RunResult,
  TextExtractor,
} from './types';

import { CandidatesExhaustedError } from '@propscan/property-extractor';
import { PropscanError } from '@propscan/shared';
import { join } from 'node:path';

import { SCHEDULER } from '../config/constants';

/** Options for PipelineEngine */
export interface PipelineEngineOptions {
  logger: LoggerMethods;
  store: DocumentStore;
  textExtractor: TextExtractor;
  propertyExtractor: PropertyExtractor;

  /**
   * Directory holding stored files
   */
  uploadDir: string;

  /**
   * Retry count at which LLM exhaustion becomes terminal (default: 5)
   */
  retryLimit?: number;
}

/**
 * PipelineEngine
 *
 * Advances one document by at most one stage transition per run: OCR first,
 * then structured extraction. All state lives in the store; the engine keeps
 * none between runs.
 *
 * `run` never throws. Failures become a state transition (stage back to
 * `pending`, retry count incremented, error message recorded) and are
 * reported in the returned RunResult.
 */
export class PipelineEngine implements PipelineRunner {
  private readonly logger: LoggerMethods;
  private readonly store: DocumentStore;
  private readonly textExtractor: TextExtractor;
  private readonly propertyExtractor: PropertyExtractor;
  private readonly uploadDir: string;
  private readonly retryLimit: number;

  constructor(options: PipelineEngineOptions) {
    this.logger = options.logger;
    this.store = options.store;
    this.textExtractor = options.textExtractor;
    this.propertyExtractor = options.propertyExtractor;
    this.uploadDir = options.uploadDir;
    this.retryLimit = options.retryLimit ?? SCHEDULER.RETRY_LIMIT;
  }

  async run(documentId: number): Promise<RunResult> {
    const tag = `[PipelineEngine] [doc:${documentId}]`;
    let stage: PipelineStage | null = null;

    try {
      const found = this.store.getDocument(documentId);
      if (!found) {
        this.logger.warn(`${tag} Document not found`);
        return { documentId, outcome: 'missing', requeue: false };
      }

      const document = this.healStaleStages(found, tag);

      if (document.ocrStatus === 'pending') {
        stage = 'ocr';
        return await this.runOcr(document, tag);
      }

      if (
        document.ocrStatus === 'done' &&
        (document.llmStatus === 'pending' || document.llmStatus === 'failed')
      ) {
        const ocrText = document.ocrText?.trim() ? document.ocrText : null;
        if (ocrText === null) {
          this.logger.warn(
            `${tag} OCR marked done without text, resetting both stages`,
          );
          this.store.updateOcrStatus(documentId, 'pending', null);
          this.store.updateLlmStatus(documentId, 'pending', null, null);
          return { documentId, outcome: 'healed', requeue: false };
        }

        stage = 'llm';
        return await this.runLlm(document, ocrText, tag);
      }

      this.logger.debug(`${tag} Nothing to do`);
      return { documentId, outcome: 'idle', requeue: false };
    } catch (error) {
      return this.handleFailure(documentId, stage, error, tag);
    }
  }

  /**
   * A stage found in `processing` belongs to a run that no longer exists
   */
  private healStaleStages(document: Document, tag: string): Document {
    if (
      document.ocrStatus !== 'processing' &&
      document.llmStatus !== 'processing'
    ) {
      return document;
    }

    this.logger.warn(`${tag} Found stale processing state, resetting`);
    const healed: Document = { ...document };
    if (healed.ocrStatus === 'processing') {
      this.store.updateOcrStatus(healed.id, 'pending');
      healed.ocrStatus = 'pending';
    }
    if (healed.llmStatus === 'processing') {
      this.store.updateLlmStatus(healed.id, 'pending');
      healed.llmStatus = 'pending';
    }
    return healed;
  }

  private async runOcr(document: Document, tag: string): Promise<RunResult> {
    const { id } = document;

    this.store.updateOcrStatus(id, 'processing');
    this.logger.info(`${tag} OCR started (${document.name})`);

    const text = await this.textExtractor.extractText(
      join(this.uploadDir, document.fileName),
      id,
    );

    if (text.trim().length === 0) {
      this.store.updateOcrStatus(id, 'pending');
      const softFailures = this.store.incrementSoftFailures(id);
      this.logger.warn(
        `${tag} OCR returned no text (empty result #${softFailures})`,
      );
      return { documentId: id, outcome: 'ocr-empty', requeue: false };
    }

    this.store.updateOcrStatus(id, 'done', text);
    this.logger.info(`${tag} OCR done (${text.length} chars)`);
    return { documentId: id, outcome: 'ocr-done', requeue: true };
  }

  private async runLlm(
    document: Document,
    ocrText: string,
    tag: string,
  ): Promise<RunResult> {
    const { id } = document;

    this.store.updateLlmStatus(id, 'processing');
    this.logger.info(`${tag} LLM extraction started`);

    const { properties, modelUsed } =
      await this.propertyExtractor.extractProperties(ocrText, id);

    this.store.updateLlmStatus(id, 'done', properties, modelUsed);
    this.logger.info(`${tag} LLM extraction done with ${modelUsed}`);
    return { documentId: id, outcome: 'llm-done', requeue: false };
  }

  private handleFailure(
    documentId: number,
    stage: PipelineStage | null,
    error: unknown,
    tag: string,
  ): RunResult {
    const message = PropscanError.getErrorMessage(error);
    if (
      stage === 'llm' &&
      error instanceof CandidatesExhaustedError &&
      error.rateLimitedOnly
    ) {
      return this.deferLlm(documentId, message, tag);
    }

    let outcome: RunOutcome =
      stage === 'ocr' ? 'ocr-failed' : stage === 'llm' ? 'llm-failed' : 'failed';

    this.logger.error(`${tag} ${stage ?? 'run'} failed: ${message}`);

    try {
      const retryCount = this.store.incrementRetry(documentId);
      if (stage) {
        this.store.recordError(documentId, stage, message);
      }

      if (
        stage === 'llm' &&
        error instanceof CandidatesExhaustedError &&
        retryCount >= this.retryLimit
      ) {
        this.store.updateLlmStatus(documentId, 'failed');
        outcome = 'llm-exhausted';
        this.logger.error(
          `${tag} LLM stage failed permanently after ${retryCount} retries`,
        );
      } else {
        this.releaseProcessing(documentId);
      }
    } catch (storeError) {
      this.logger.error(
        `${tag} Could not record failure: ${PropscanError.getErrorMessage(storeError)}`,
      );
    }

    return { documentId, outcome, requeue: false, error: message };
  }

  /**
   * Rate limits do not count against the retry budget
   */
  private deferLlm(documentId: number, message: string, tag: string): RunResult {
    this.logger.warn(`${tag} LLM deferred, all candidates rate-limited: ${message}`);

    try {
      this.store.recordError(documentId, 'llm', message);
      this.releaseProcessing(documentId);
    } catch (storeError) {
      this.logger.error(
        `${tag} Could not record deferral: ${PropscanError.getErrorMessage(storeError)}`,
      );
    }

    return { documentId, outcome: 'llm-deferred', requeue: false, error: message };
  }

  private releaseProcessing(documentId: number): void {
    const document = this.store.getDocument(documentId);
    if (document?.ocrStatus === 'processing') {
      this.store.updateOcrStatus(documentId, 'pending');
    }
    if (document?.llmStatus === 'processing') {
      this.store.updateLlmStatus(documentId, 'pending');
    }
  }
}
