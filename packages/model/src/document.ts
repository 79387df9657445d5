import type { PropertyFields } from './property-fields';

/**
 * Status of the OCR stage.
 *
 * OCR never terminally fails; every failure returns the stage to `pending`.
 */
export type OcrStatus = 'pending' | 'processing' | 'done';

/**
 * Status of the LLM extraction stage
 */
export type LlmStatus = 'pending' | 'processing' | 'done' | 'failed';

/**
 * Pipeline stage identifier
 */
export type PipelineStage = 'ocr' | 'llm';

/**
 * A scanned document moving through the OCR → LLM pipeline
 */
export interface Document {
  /**
   * Stable numeric identifier
   */
  id: number;

  /**
   * Original file name as uploaded
   */
  name: string;

  /**
   * Stored file name inside the upload directory (`<contentHash><ext>`)
   */
  fileName: string;

  /**
   * MD5 of the file bytes, hex encoded. Used for upload deduplication.
   */
  contentHash: string;

  /**
   * Favorited documents are dispatched ahead of the rest
   */
  favorite: boolean;

  /**
   * ISO timestamp of upload
   */
  uploadedAt: string;

  ocrStatus: OcrStatus;

  /**
   * Raw OCR text, present only once the OCR stage succeeded
   */
  ocrText: string | null;

  /**
   * Last OCR error message, cleared on success
   */
  ocrError: string | null;

  llmStatus: LlmStatus;

  /**
   * Extracted property fields, present only once the LLM stage succeeded
   */
  properties: PropertyFields | null;

  /**
   * Model identifier that produced `properties`
   */
  extractedModel: string | null;

  /**
   * Last LLM error message, cleared on success
   */
  llmError: string | null;

  /**
   * Incremented on every stage failure
   */
  retryCount: number;

  /**
   * Number of OCR runs that returned empty text
   */
  softFailures: number;
}
