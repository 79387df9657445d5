import type { LoggerMethods } from '@propscan/logger';

import { spawnAsync } from '@propscan/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import { PAGE_RENDERER } from '../config/constants';
import { TextExtractionError } from '../errors/text-extraction-error';

/** Result of page rendering */
export interface PageRenderResult {
  /** Total number of pages rendered */
  pageCount: number;
  /** Absolute path to the pages directory */
  pagesDir: string;
  /** Sorted list of rendered page file paths (absolute) */
  pageFiles: string[];
}

/** Options for page rendering */
export interface PageRendererOptions {
  /** DPI for PDF rasterization (default: 200) */
  dpi?: number;
  /** Longest edge in pixels (default: 1400) */
  maxSize?: number;
}

const PAGE_FILE_PATTERN = /^page_(\d+)\.png$/;

/**
 * Renders input files to PNG page images using ImageMagick.
 *
 * Rasterization runs in a child process so concurrent pipeline runs keep
 * making network progress while a large PDF is being decoded.
 *
 * ## System Requirements
 * - ImageMagick 7 (`magick` on PATH)
 * - Ghostscript (for PDF input)
 */
export class PageRenderer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Render all pages of a PDF to individual PNG files.
   *
   * @param pdfPath - Absolute path to the source PDF file
   * @param outputDir - Directory where the pages/ subdirectory will be created
   */
  async renderPdf(
    pdfPath: string,
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<PageRenderResult> {
    const dpi = options?.dpi ?? PAGE_RENDERER.PDF_DPI;

    this.logger.debug(`[PageRenderer] Rendering PDF at ${dpi} DPI...`);

    return this.render(
      ['-density', dpi.toString(), pdfPath],
      outputDir,
      options,
    );
  }

  /**
   * Normalize a raster image (first frame only) to a single PNG page.
   *
   * @param imagePath - Absolute path to the source image
   * @param outputDir - Directory where the pages/ subdirectory will be created
   */
  async renderImage(
    imagePath: string,
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<PageRenderResult> {
    return this.render([`${imagePath}[0]`, '-auto-orient'], outputDir, options);
  }

  private async render(
    inputArgs: string[],
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<PageRenderResult> {
    const maxSize = options?.maxSize ?? PAGE_RENDERER.MAX_IMAGE_SIZE;
    const pagesDir = join(outputDir, 'pages');

    if (!existsSync(pagesDir)) {
      mkdirSync(pagesDir, { recursive: true });
    }

    const result = await spawnAsync(
      'magick',
      [
        ...inputArgs,
        '-background',
        'white',
        '-alpha',
        'remove',
        '-alpha',
        'off',
        '-resize',
        `${maxSize}x${maxSize}>`,
        join(pagesDir, 'page_%d.png'),
      ],
      { timeoutMs: PAGE_RENDERER.RENDER_TIMEOUT_MS },
    );

    if (result.timedOut) {
      throw new TextExtractionError(
        `[PageRenderer] Rendering timed out after ${PAGE_RENDERER.RENDER_TIMEOUT_MS}ms`,
      );
    }

    if (result.code !== 0) {
      throw new TextExtractionError(
        `[PageRenderer] Failed to render pages: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    const pageFiles = readdirSync(pagesDir)
      .map((file) => PAGE_FILE_PATTERN.exec(file))
      .filter((match): match is RegExpExecArray => match !== null)
      .sort((a, b) => parseInt(a[1], 10) - parseInt(b[1], 10))
      .map((match) => join(pagesDir, match[0]));

    this.logger.debug(
      `[PageRenderer] Rendered ${pageFiles.length} pages to ${pagesDir}`,
    );

    return {
      pageCount: pageFiles.length,
      pagesDir,
      pageFiles,
    };
  }
}
