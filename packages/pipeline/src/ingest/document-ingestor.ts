import type { LoggerMethods } from '@propscan/logger';
import type { Document } from '@propscan/model';

import type { DocumentStore } from '../store/document-store';

import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { copyFile, mkdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import { SUPPORTED_EXTENSIONS } from '../config/constants';
import { IngestionError } from '../errors/pipeline-errors';

/** Options for DocumentIngestor */
export interface DocumentIngestorOptions {
  logger: LoggerMethods;
  store: DocumentStore;

  /**
   * Directory receiving stored files, created on demand
   */
  uploadDir: string;
}

export interface IngestResult {
  document: Document;

  /**
   * True when a document with the same content already existed
   */
  duplicate: boolean;
}

/**
 * Adds files to the pipeline.
 *
 * Files are identified by the MD5 of their bytes. A known hash returns the
 * existing document; otherwise the file is copied to `<uploadDir>/<hash><ext>`
 * and a new document starts at OCR pending.
 */
export class DocumentIngestor {
  private readonly logger: LoggerMethods;
  private readonly store: DocumentStore;
  private readonly uploadDir: string;

  constructor(options: DocumentIngestorOptions) {
    this.logger = options.logger;
    this.store = options.store;
    this.uploadDir = options.uploadDir;
  }

  /**
   * @param sourcePath - File to ingest
   * @param originalName - Name to record (default: base name of `sourcePath`)
   * @throws IngestionError for missing files and unsupported types
   */
  async ingest(sourcePath: string, originalName?: string): Promise<IngestResult> {
    const name = originalName ?? basename(sourcePath);
    const extension = extname(name).toLowerCase();

    if (!DocumentIngestor.isSupported(extension)) {
      throw new IngestionError(
        `Unsupported file type "${extension || '(none)'}": ${name}`,
      );
    }
    if (!existsSync(sourcePath)) {
      throw new IngestionError(`File not found: ${sourcePath}`);
    }

    const contentHash = createHash('md5')
      .update(await readFile(sourcePath))
      .digest('hex');

    const existing = this.store.getDocumentByHash(contentHash);
    if (existing) {
      this.logger.info(
        `[DocumentIngestor] ${name} is a duplicate of document ${existing.id}`,
      );
      return { document: existing, duplicate: true };
    }

    await mkdir(this.uploadDir, { recursive: true });
    await copyFile(sourcePath, join(this.uploadDir, `${contentHash}${extension}`));

    const id = this.store.createDocument(name, contentHash);
    const document = this.store.getDocument(id);
    if (!document) {
      throw new IngestionError(`Document ${id} vanished after creation`);
    }

    this.logger.info(`[DocumentIngestor] [doc:${id}] Ingested ${name}`);
    return { document, duplicate: false };
  }

  static isSupported(extension: string): boolean {
    const normalized = extension.toLowerCase();
    return SUPPORTED_EXTENSIONS.some((candidate) => candidate === normalized);
  }
}
