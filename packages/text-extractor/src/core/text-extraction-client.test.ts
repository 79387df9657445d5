import type { LanguageModel } from 'ai';

import type { PageRasterizer } from './text-extraction-client';

import { generateText } from 'ai';
import {
  mkdirSync,
  mkdtempSync,
  readdirSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { TextExtractionError } from '../errors/text-extraction-error';
import { TextExtractionClient } from './text-extraction-client';

vi.mock('ai', () => ({
  generateText: vi.fn(),
}));

const mockGenerateText = vi.mocked(generateText);

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const ocrModel = { modelId: 'test-ocr-model' } as LanguageModel;

function textResult(text: string) {
  return { text } as Awaited<ReturnType<typeof generateText>>;
}

/** Rasterizer that writes `pageCount` fake PNG files into the scratch dir */
function createFakeRenderer(pageCount: number) {
  const render = async (_input: string, outputDir: string) => {
    const pagesDir = join(outputDir, 'pages');
    mkdirSync(pagesDir, { recursive: true });
    const pageFiles = Array.from({ length: pageCount }, (_, i) => {
      const file = join(pagesDir, `page_${i}.png`);
      writeFileSync(file, Buffer.from(`png-${i}`));
      return file;
    });
    return { pageCount, pagesDir, pageFiles };
  };

  return {
    renderPdf: vi.fn(render),
    renderImage: vi.fn(render),
  } satisfies PageRasterizer;
}

describe('TextExtractionClient', () => {
  let rootDir: string;
  let workDir: string;
  let pdfPath: string;
  let imagePath: string;

  beforeEach(() => {
    rootDir = mkdtempSync(join(tmpdir(), 'text-extraction-test-'));
    workDir = join(rootDir, 'work');
    mkdirSync(workDir);
    pdfPath = join(rootDir, 'flyer.pdf');
    imagePath = join(rootDir, 'flyer.JPG');
    writeFileSync(pdfPath, 'pdf-bytes');
    writeFileSync(imagePath, 'jpg-bytes');
  });

  afterEach(() => {
    rmSync(rootDir, { recursive: true, force: true });
  });

  function createClient(renderer: PageRasterizer) {
    return new TextExtractionClient({
      logger: mockLogger,
      model: ocrModel,
      pageRenderer: renderer,
      workDir,
    });
  }

  test('joins PDF pages with page markers and skips empty pages', async () => {
    const renderer = createFakeRenderer(3);
    mockGenerateText
      .mockResolvedValueOnce(textResult('first page'))
      .mockResolvedValueOnce(textResult('   '))
      .mockResolvedValueOnce(textResult('third page'));

    const text = await createClient(renderer).extractText(pdfPath, 7);

    expect(text).toBe('[Page 1]\nfirst page\n\n[Page 3]\nthird page');
    expect(renderer.renderPdf).toHaveBeenCalledTimes(1);
    expect(renderer.renderImage).not.toHaveBeenCalled();
    expect(mockGenerateText).toHaveBeenCalledTimes(3);
  });

  test('returns the raw model output for a single image', async () => {
    const renderer = createFakeRenderer(1);
    mockGenerateText.mockResolvedValueOnce(textResult('物件名 サンプル'));

    const text = await createClient(renderer).extractText(imagePath, 8);

    expect(text).toBe('物件名 サンプル');
    expect(renderer.renderImage).toHaveBeenCalledTimes(1);
  });

  test('returns an empty string when the model sees no text', async () => {
    mockGenerateText.mockResolvedValueOnce(textResult(''));

    const text = await createClient(createFakeRenderer(1)).extractText(
      imagePath,
      9,
    );

    expect(text).toBe('');
  });

  test('sends the page image with the OCR model', async () => {
    mockGenerateText.mockResolvedValueOnce(textResult('text'));

    await createClient(createFakeRenderer(1)).extractText(imagePath, 10);

    const call = mockGenerateText.mock.calls[0][0];
    expect(call.model).toBe(ocrModel);
    expect(call.temperature).toBe(0.1);
    expect(call.abortSignal).toBeInstanceOf(AbortSignal);
    expect(call.messages).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: expect.stringContaining('Never translate') },
          {
            type: 'image',
            image: Buffer.from('png-0'),
            mediaType: 'image/png',
          },
        ],
      },
    ]);
  });

  test('removes the scratch directory after a call', async () => {
    mockGenerateText.mockResolvedValueOnce(textResult('text'));

    await createClient(createFakeRenderer(1)).extractText(imagePath, 11);

    expect(readdirSync(workDir)).toEqual([]);
  });

  test('removes the scratch directory when the service fails', async () => {
    mockGenerateText.mockRejectedValueOnce(new Error('boom'));

    await expect(
      createClient(createFakeRenderer(1)).extractText(imagePath, 12),
    ).rejects.toThrow(TextExtractionError);
    expect(readdirSync(workDir)).toEqual([]);
  });

  test('wraps service errors with the cause attached', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:8000');
    mockGenerateText.mockRejectedValueOnce(cause);

    const error = await createClient(createFakeRenderer(1))
      .extractText(imagePath, 13)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TextExtractionError);
    expect((error as TextExtractionError).message).toBe(
      'OCR request failed: connect ECONNREFUSED 127.0.0.1:8000',
    );
    expect((error as TextExtractionError).cause).toBe(cause);
  });

  test('fails for a PDF without pages', async () => {
    await expect(
      createClient(createFakeRenderer(0)).extractText(pdfPath, 14),
    ).rejects.toThrow(`PDF has no renderable pages: ${pdfPath}`);
    expect(mockGenerateText).not.toHaveBeenCalled();
  });

  test('fails for a missing file without rendering', async () => {
    const renderer = createFakeRenderer(1);
    const missing = join(rootDir, 'missing.pdf');

    await expect(createClient(renderer).extractText(missing, 15)).rejects.toThrow(
      `File not found: ${missing}`,
    );
    expect(renderer.renderPdf).not.toHaveBeenCalled();
  });

  test('fails for an unsupported extension', async () => {
    const docx = join(rootDir, 'flyer.docx');
    writeFileSync(docx, 'docx');

    await expect(
      createClient(createFakeRenderer(1)).extractText(docx, 16),
    ).rejects.toThrow(`Unsupported file type ".docx": ${docx}`);
  });
});
