import type {
  Document,
  LlmStatus,
  OcrStatus,
  PipelineStage,
  PropertyFields,
} from '@propscan/model';

/**
 * Extra filters applied on top of the eligibility rule
 */
export interface EligibilityPolicy {
  /**
   * Documents stuck in `processing` stop being eligible at this retry count
   */
  retryLimit: number;

  /**
   * Documents stop being eligible altogether at this retry count
   */
  attemptLimit?: number;

  /**
   * Documents stop being eligible once this many OCR runs came back empty
   */
  softFailureLimit?: number;
}

/**
 * Persistence boundary for documents.
 *
 * Every operation is synchronous and atomic within the process. Mutations on
 * an unknown id throw DocumentNotFoundError.
 */
export interface DocumentStore {
  createDocument(name: string, contentHash: string): number;
  getDocument(id: number): Document | null;
  getDocumentByHash(contentHash: string): Document | null;

  /**
   * Set the OCR status. `text` replaces the stored text when given; `done`
   * clears the last OCR error.
   */
  updateOcrStatus(id: number, status: OcrStatus, text?: string | null): void;

  /**
   * Set the LLM status. `properties` and `model` replace the stored values
   * when given; `done` clears the last LLM error.
   */
  updateLlmStatus(
    id: number,
    status: LlmStatus,
    properties?: PropertyFields | null,
    model?: string | null,
  ): void;

  /**
   * @returns the new retry count
   */
  incrementRetry(id: number): number;

  /**
   * @returns the new soft-failure count
   */
  incrementSoftFailures(id: number): number;

  recordError(id: number, stage: PipelineStage, message: string): void;

  /**
   * Documents with work to do, favorites first then oldest upload.
   *
   * Eligible: OCR pending, or OCR done with LLM pending, or either stage
   * stuck in `processing` below the retry limit.
   */
  getEligibleDocuments(limit: number, policy: EligibilityPolicy): Document[];

  /**
   * Reset every `processing` stage to `pending`
   *
   * @returns number of documents touched
   */
  resetStaleProcessing(): number;

  /**
   * All documents, favorites first, then done, pending, processing and
   * failed, newest upload first within each group
   */
  listDocuments(): Document[];

  /**
   * @returns the new favorite flag
   */
  toggleFavorite(id: number): boolean;

  /**
   * Send a document back to the start of the pipeline with a fresh retry budget
   */
  resetOcrStatus(id: number): void;

  /**
   * Redo only the LLM stage with a fresh retry budget
   */
  resetLlmStatus(id: number): void;

  /**
   * @returns false when the id was unknown
   */
  deleteDocument(id: number): boolean;
}
