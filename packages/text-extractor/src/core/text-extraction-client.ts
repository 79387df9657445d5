import type { LoggerMethods } from '@propscan/logger';
import type { LanguageModel } from 'ai';

import type { PageRenderResult } from '../processors/page-renderer';

import { ConcurrentPool } from '@propscan/shared';
import { generateText } from 'ai';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { extname, join } from 'node:path';

import { IMAGE_EXTENSIONS, TEXT_EXTRACTION } from '../config/constants';
import { TextExtractionError } from '../errors/text-extraction-error';
import { PageRenderer } from '../processors/page-renderer';

/**
 * Layout-aware transcription prompt sent with every page image.
 */
const PAGE_OCR_PROMPT = `Transcribe every piece of text visible in this document image.

1. Layout categories: Caption, Footnote, List-item, Page-footer, Page-header, Title, Table, Text.

2. Formatting:
   - Table: format as HTML.
   - Everything else: format as Markdown.

3. Constraints:
   - Output the original text exactly as printed. Never translate.
   - Follow human reading order (top to bottom, left to right for multi-column layouts).
   - Include headers, footers and small print near the page edges.

4. Output: a single JSON object describing the layout elements and their text.`;

/**
 * Subset of PageRenderer used by the client
 */
export interface PageRasterizer {
  renderPdf(pdfPath: string, outputDir: string): Promise<PageRenderResult>;
  renderImage(imagePath: string, outputDir: string): Promise<PageRenderResult>;
}

/** Options for TextExtractionClient */
export interface TextExtractionClientOptions {
  logger: LoggerMethods;

  /**
   * Vision model exposed by the OCR service
   */
  model: LanguageModel;

  /**
   * Page rasterizer (default: ImageMagick-backed PageRenderer)
   */
  pageRenderer?: PageRasterizer;

  /**
   * Timeout per page call in milliseconds (default: 300000)
   */
  timeoutMs?: number;

  /**
   * Pages of one document sent concurrently (default: 1)
   */
  pageConcurrency?: number;

  /**
   * Parent directory for per-call scratch directories (default: OS temp dir)
   */
  workDir?: string;
}

/**
 * TextExtractionClient
 *
 * Converts an image or multi-page PDF into text by rasterizing it and sending
 * each page to an OCR vision model. Stateless between calls and never touches
 * the document store; the caller persists the result.
 */
export class TextExtractionClient {
  private readonly logger: LoggerMethods;
  private readonly model: LanguageModel;
  private readonly pageRenderer: PageRasterizer;
  private readonly timeoutMs: number;
  private readonly pageConcurrency: number;
  private readonly workDir: string;

  constructor(options: TextExtractionClientOptions) {
    this.logger = options.logger;
    this.model = options.model;
    this.pageRenderer =
      options.pageRenderer ?? new PageRenderer(options.logger);
    this.timeoutMs = options.timeoutMs ?? TEXT_EXTRACTION.DEFAULT_TIMEOUT_MS;
    this.pageConcurrency =
      options.pageConcurrency ?? TEXT_EXTRACTION.DEFAULT_PAGE_CONCURRENCY;
    this.workDir = options.workDir ?? tmpdir();
  }

  /**
   * Extract text from a file.
   *
   * PDF pages are joined as `[Page N]` blocks, skipping pages with no text.
   * A single image returns the model output unchanged. The result may be an
   * empty string; judging that is up to the caller.
   *
   * @throws TextExtractionError on unreadable input, render failure, timeout
   * or any OCR service error
   */
  async extractText(filePath: string, documentId: number): Promise<string> {
    const tag = `[TextExtractionClient] [doc:${documentId}]`;

    if (!existsSync(filePath)) {
      throw new TextExtractionError(`File not found: ${filePath}`);
    }

    const extension = extname(filePath).toLowerCase();
    const isPdf = extension === '.pdf';
    if (!isPdf && !this.isImageExtension(extension)) {
      throw new TextExtractionError(
        `Unsupported file type "${extension || '(none)'}": ${filePath}`,
      );
    }

    const scratchDir = await mkdtemp(join(this.workDir, 'propscan-ocr-'));

    try {
      const rendered = isPdf
        ? await this.pageRenderer.renderPdf(filePath, scratchDir)
        : await this.pageRenderer.renderImage(filePath, scratchDir);

      if (rendered.pageCount === 0) {
        throw new TextExtractionError(
          isPdf
            ? `PDF has no renderable pages: ${filePath}`
            : `Image could not be decoded: ${filePath}`,
        );
      }

      this.logger.info(
        `${tag} Sending ${rendered.pageCount} page(s) to ${this.modelName()}`,
      );

      const pageTexts = await ConcurrentPool.run(
        rendered.pageFiles,
        this.pageConcurrency,
        (pageFile, index) => this.recognizePage(pageFile, index + 1, tag),
      );

      const text = isPdf
        ? pageTexts
            .map((pageText, index) => ({ pageText, pageNo: index + 1 }))
            .filter(({ pageText }) => pageText.trim().length > 0)
            .map(({ pageText, pageNo }) => `[Page ${pageNo}]\n${pageText}`)
            .join('\n\n')
        : pageTexts[0];

      this.logger.info(`${tag} OCR finished (${text.length} chars)`);
      return text;
    } catch (error) {
      throw TextExtractionError.fromError('OCR request failed', error);
    } finally {
      await rm(scratchDir, { recursive: true, force: true });
    }
  }

  private async recognizePage(
    pageFile: string,
    pageNo: number,
    tag: string,
  ): Promise<string> {
    this.logger.debug(`${tag} Recognizing page ${pageNo}...`);

    const image = await readFile(pageFile);
    const result = await generateText({
      model: this.model,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: PAGE_OCR_PROMPT },
            { type: 'image', image, mediaType: 'image/png' },
          ],
        },
      ],
      temperature: TEXT_EXTRACTION.TEMPERATURE,
      maxRetries: TEXT_EXTRACTION.MAX_RETRIES,
      abortSignal: AbortSignal.timeout(this.timeoutMs),
    });

    return result.text;
  }

  private isImageExtension(extension: string): boolean {
    return IMAGE_EXTENSIONS.some((candidate) => candidate === extension);
  }

  private modelName(): string {
    return typeof this.model === 'string' ? this.model : this.model.modelId;
  }
}
