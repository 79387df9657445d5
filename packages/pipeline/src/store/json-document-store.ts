import type {
  Document,
  LlmStatus,
  OcrStatus,
  PipelineStage,
  PropertyFields,
} from '@propscan/model';

import type { DocumentStore, EligibilityPolicy } from './document-store';

import { propertyFieldsSchema } from '@propscan/model';
import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from 'node:fs';
import { dirname, extname } from 'node:path';
import { z } from 'zod/v4';

import {
  DocumentNotFoundError,
  DocumentStoreError,
} from '../errors/pipeline-errors';

const documentRecordSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  file_name: z.string(),
  content_hash: z.string(),
  favorite: z.boolean(),
  uploaded_at: z.string(),
  ocr_status: z.enum(['pending', 'processing', 'done']),
  ocr_text: z.string().nullable(),
  ocr_error: z.string().nullable(),
  llm_status: z.enum(['pending', 'processing', 'done', 'failed']),
  properties: propertyFieldsSchema.nullable(),
  extracted_model: z.string().nullable(),
  llm_error: z.string().nullable(),
  retry_count: z.number().int().nonnegative(),
  soft_failures: z.number().int().nonnegative().default(0),
});

const databaseSchema = z.object({
  documents: z.array(documentRecordSchema),
  next_document_id: z.number().int().positive(),
});

type DocumentRecord = z.infer<typeof documentRecordSchema>;
type Database = z.infer<typeof databaseSchema>;

function recordToDocument(record: DocumentRecord): Document {
  return {
    id: record.id,
    name: record.name,
    fileName: record.file_name,
    contentHash: record.content_hash,
    favorite: record.favorite,
    uploadedAt: record.uploaded_at,
    ocrStatus: record.ocr_status,
    ocrText: record.ocr_text,
    ocrError: record.ocr_error,
    llmStatus: record.llm_status,
    properties: record.properties,
    extractedModel: record.extracted_model,
    llmError: record.llm_error,
    retryCount: record.retry_count,
    softFailures: record.soft_failures,
  };
}

/**
 * Display rank used by listDocuments: done, pending, processing, failed
 */
function listRank(record: DocumentRecord): number {
  if (record.ocr_status === 'processing' || record.llm_status === 'processing') {
    return 3;
  }
  if (record.llm_status === 'done') {
    return 1;
  }
  if (record.llm_status === 'failed') {
    return 4;
  }
  return 2;
}

function isEligible(record: DocumentRecord, policy: EligibilityPolicy): boolean {
  if (
    policy.attemptLimit !== undefined &&
    record.retry_count >= policy.attemptLimit
  ) {
    return false;
  }
  if (
    policy.softFailureLimit !== undefined &&
    record.soft_failures >= policy.softFailureLimit
  ) {
    return false;
  }

  const belowRetryLimit = record.retry_count < policy.retryLimit;
  return (
    record.ocr_status === 'pending' ||
    (record.ocr_status === 'done' && record.llm_status === 'pending') ||
    (record.ocr_status === 'processing' && belowRetryLimit) ||
    (record.llm_status === 'processing' && belowRetryLimit)
  );
}

/** Options for JsonDocumentStore */
export interface JsonDocumentStoreOptions {
  /**
   * Path of the JSON database file, created on first use
   */
  dbPath: string;

  /**
   * Clock for upload timestamps (default: current time)
   */
  now?: () => Date;
}

/**
 * DocumentStore backed by a single JSON file.
 *
 * Each call reads the file, applies its change and writes it back through a
 * temporary file and rename. Calls are synchronous, so no two updates
 * interleave inside one process.
 *
 * Every call, polls included, costs a full read and validation of the file
 * (OCR text of every document included), and every update a full rewrite.
 */
export class JsonDocumentStore implements DocumentStore {
  private readonly dbPath: string;
  private readonly now: () => Date;

  constructor(options: JsonDocumentStoreOptions) {
    this.dbPath = options.dbPath;
    this.now = options.now ?? (() => new Date());
  }

  createDocument(name: string, contentHash: string): number {
    const db = this.read();
    const id = db.next_document_id;

    db.documents.push({
      id,
      name,
      file_name: `${contentHash}${extname(name).toLowerCase()}`,
      content_hash: contentHash,
      favorite: false,
      uploaded_at: this.now().toISOString(),
      ocr_status: 'pending',
      ocr_text: null,
      ocr_error: null,
      llm_status: 'pending',
      properties: null,
      extracted_model: null,
      llm_error: null,
      retry_count: 0,
      soft_failures: 0,
    });
    db.next_document_id = id + 1;
    this.write(db);

    return id;
  }

  getDocument(id: number): Document | null {
    const record = this.read().documents.find((d) => d.id === id);
    return record ? recordToDocument(record) : null;
  }

  getDocumentByHash(contentHash: string): Document | null {
    const record = this.read().documents.find(
      (d) => d.content_hash === contentHash,
    );
    return record ? recordToDocument(record) : null;
  }

  updateOcrStatus(id: number, status: OcrStatus, text?: string | null): void {
    this.mutate(id, (record) => {
      record.ocr_status = status;
      if (text !== undefined) {
        record.ocr_text = text;
      }
      if (status === 'done') {
        record.ocr_error = null;
      }
    });
  }

  updateLlmStatus(
    id: number,
    status: LlmStatus,
    properties?: PropertyFields | null,
    model?: string | null,
  ): void {
    this.mutate(id, (record) => {
      record.llm_status = status;
      if (properties !== undefined) {
        record.properties = properties;
      }
      if (model !== undefined) {
        record.extracted_model = model;
      }
      if (status === 'done') {
        record.llm_error = null;
      }
    });
  }

  incrementRetry(id: number): number {
    return this.mutate(id, (record) => ++record.retry_count);
  }

  incrementSoftFailures(id: number): number {
    return this.mutate(id, (record) => ++record.soft_failures);
  }

  recordError(id: number, stage: PipelineStage, message: string): void {
    this.mutate(id, (record) => {
      if (stage === 'ocr') {
        record.ocr_error = message;
      } else {
        record.llm_error = message;
      }
    });
  }

  getEligibleDocuments(limit: number, policy: EligibilityPolicy): Document[] {
    return this.read()
      .documents.filter((record) => isEligible(record, policy))
      .sort(
        (a, b) =>
          Number(b.favorite) - Number(a.favorite) ||
          a.uploaded_at.localeCompare(b.uploaded_at) ||
          a.id - b.id,
      )
      .slice(0, limit)
      .map(recordToDocument);
  }

  resetStaleProcessing(): number {
    const db = this.read();
    let touched = 0;

    for (const record of db.documents) {
      let stale = false;
      if (record.ocr_status === 'processing') {
        record.ocr_status = 'pending';
        stale = true;
      }
      if (record.llm_status === 'processing') {
        record.llm_status = 'pending';
        stale = true;
      }
      if (stale) {
        touched++;
      }
    }

    if (touched > 0) {
      this.write(db);
    }
    return touched;
  }

  listDocuments(): Document[] {
    return this.read()
      .documents.sort(
        (a, b) =>
          Number(b.favorite) - Number(a.favorite) ||
          listRank(a) - listRank(b) ||
          b.uploaded_at.localeCompare(a.uploaded_at) ||
          b.id - a.id,
      )
      .map(recordToDocument);
  }

  toggleFavorite(id: number): boolean {
    return this.mutate(id, (record) => {
      record.favorite = !record.favorite;
      return record.favorite;
    });
  }

  resetOcrStatus(id: number): void {
    this.mutate(id, (record) => {
      record.ocr_status = 'pending';
      record.ocr_text = null;
      record.ocr_error = null;
      record.llm_status = 'pending';
      record.properties = null;
      record.extracted_model = null;
      record.llm_error = null;
      record.retry_count = 0;
      record.soft_failures = 0;
    });
  }

  resetLlmStatus(id: number): void {
    this.mutate(id, (record) => {
      record.llm_status = 'pending';
      record.properties = null;
      record.extracted_model = null;
      record.llm_error = null;
      record.retry_count = 0;
    });
  }

  deleteDocument(id: number): boolean {
    const db = this.read();
    const index = db.documents.findIndex((d) => d.id === id);
    if (index === -1) {
      return false;
    }
    db.documents.splice(index, 1);
    this.write(db);
    return true;
  }

  private mutate<T>(id: number, update: (record: DocumentRecord) => T): T {
    const db = this.read();
    const record = db.documents.find((d) => d.id === id);
    if (!record) {
      throw new DocumentNotFoundError(id);
    }
    const result = update(record);
    this.write(db);
    return result;
  }

  private read(): Database {
    if (!existsSync(this.dbPath)) {
      return { documents: [], next_document_id: 1 };
    }

    let content: unknown;
    try {
      content = JSON.parse(readFileSync(this.dbPath, 'utf-8'));
    } catch (error) {
      throw DocumentStoreError.fromError(
        `Failed to read database ${this.dbPath}`,
        error,
      );
    }

    const result = databaseSchema.safeParse(content);
    if (!result.success) {
      throw new DocumentStoreError(
        `Invalid database ${this.dbPath}: ${z.prettifyError(result.error)}`,
      );
    }
    return result.data;
  }

  private write(db: Database): void {
    const dir = dirname(this.dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmpPath = `${this.dbPath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(db, null, 2));
    renameSync(tmpPath, this.dbPath);
  }
}
