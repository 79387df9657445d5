import type { PropertyFields } from '@propscan/model';

/**
 * Turns a stored file into text. Empty output is a valid result.
 */
export interface TextExtractor {
  extractText(filePath: string, documentId: number): Promise<string>;
}

/**
 * Turns OCR text into property fields tagged with the producing model
 */
export interface PropertyExtractor {
  extractProperties(
    ocrText: string,
    documentId: number,
  ): Promise<{ properties: PropertyFields; modelUsed: string }>;
}

/**
 * What a single pipeline run did
 *
 * - `missing`: no such document
 * - `idle`: nothing to do (both stages done, or LLM failed terminally)
 * - `healed`: OCR was done without text; both stages sent back to pending
 * - `ocr-done` / `llm-done`: the stage succeeded
 * - `ocr-empty`: OCR returned no text; stage back to pending
 * - `ocr-failed` / `llm-failed`: the stage threw; stage back to pending
 * - `llm-deferred`: every model candidate was rate-limited; stage back to
 *   pending without using a retry
 * - `llm-exhausted`: every model candidate failed at the retry limit
 * - `failed`: the run failed before reaching a stage
 */
export type RunOutcome =
  | 'missing'
  | 'idle'
  | 'healed'
  | 'ocr-done'
  | 'ocr-empty'
  | 'ocr-failed'
  | 'llm-done'
  | 'llm-failed'
  | 'llm-deferred'
  | 'llm-exhausted'
  | 'failed';

export interface RunResult {
  documentId: number;
  outcome: RunOutcome;

  /**
   * The document has another stage ready and should run again soon
   */
  requeue: boolean;

  error?: string;
}

/**
 * Anything that can advance a document, as seen by the scheduler
 */
export interface PipelineRunner {
  run(documentId: number): Promise<RunResult>;
}
