import type { PropertyExtractor, TextExtractor } from './types';

import { CandidatesExhaustedError } from '@propscan/property-extractor';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  type Mock,
  afterEach,
  beforeEach,
  describe,
  expect,
  test,
  vi,
} from 'vitest';

import { JsonDocumentStore } from '../store/json-document-store';
import { PipelineEngine } from './pipeline-engine';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const PROPERTIES = {
  property_type: 'マンション',
  city: '渋谷区',
  price: 5800,
};

function exhausted() {
  return new CandidatesExhaustedError([
    { modelId: 'model-a', outcome: 'sparse', detail: '1 meaningful field(s)' },
  ]);
}

function rateLimited() {
  return new CandidatesExhaustedError([
    { modelId: 'model-a', outcome: 'rate-limited', detail: 'HTTP 429' },
    { modelId: 'model-b', outcome: 'cooling-down', detail: '42s left' },
  ]);
}

describe('PipelineEngine', () => {
  let dir: string;
  let dbPath: string;
  let store: JsonDocumentStore;
  let extractText: Mock<TextExtractor['extractText']>;
  let extractProperties: Mock<PropertyExtractor['extractProperties']>;
  let engine: PipelineEngine;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pipeline-engine-test-'));
    dbPath = join(dir, 'documents.json');
    store = new JsonDocumentStore({ dbPath });
    extractText = vi.fn<TextExtractor['extractText']>();
    extractProperties = vi.fn<PropertyExtractor['extractProperties']>();
    engine = new PipelineEngine({
      logger: mockLogger,
      store,
      textExtractor: { extractText },
      propertyExtractor: { extractProperties },
      uploadDir: '/data/uploads',
      retryLimit: 3,
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function ocrDone(text = 'ocr text'): number {
    const id = store.createDocument('flyer.pdf', `hash-${text.length}`);
    store.updateOcrStatus(id, 'done', text);
    return id;
  }

  describe('OCR stage', () => {
    test('stores text and asks for a requeue without running the LLM', async () => {
      const id = store.createDocument('flyer.pdf', 'abc');
      extractText.mockResolvedValue('物件概要');

      const result = await engine.run(id);

      expect(result).toEqual({ documentId: id, outcome: 'ocr-done', requeue: true });
      expect(extractText).toHaveBeenCalledWith('/data/uploads/abc.pdf', id);
      expect(extractProperties).not.toHaveBeenCalled();
      expect(store.getDocument(id)).toMatchObject({
        ocrStatus: 'done',
        ocrText: '物件概要',
        llmStatus: 'pending',
      });
    });

    test('treats blank text as a soft failure', async () => {
      const id = store.createDocument('flyer.pdf', 'abc');
      extractText.mockResolvedValue('  \n ');

      const result = await engine.run(id);

      expect(result).toEqual({ documentId: id, outcome: 'ocr-empty', requeue: false });
      expect(extractProperties).not.toHaveBeenCalled();
      expect(store.getDocument(id)).toMatchObject({
        ocrStatus: 'pending',
        ocrText: null,
        llmStatus: 'pending',
        retryCount: 0,
        softFailures: 1,
      });
    });

    test('returns the stage to pending on failure', async () => {
      const id = store.createDocument('flyer.pdf', 'abc');
      extractText.mockRejectedValue(new Error('OCR request failed: timeout'));

      const result = await engine.run(id);

      expect(result).toEqual({
        documentId: id,
        outcome: 'ocr-failed',
        requeue: false,
        error: 'OCR request failed: timeout',
      });
      expect(store.getDocument(id)).toMatchObject({
        ocrStatus: 'pending',
        ocrError: 'OCR request failed: timeout',
        llmStatus: 'pending',
        retryCount: 1,
      });
    });
  });

  describe('LLM stage', () => {
    test('stores properties with the producing model', async () => {
      const id = ocrDone('物件概要');
      extractProperties.mockResolvedValue({
        properties: PROPERTIES,
        modelUsed: 'model-b',
      });

      const result = await engine.run(id);

      expect(result).toEqual({ documentId: id, outcome: 'llm-done', requeue: false });
      expect(extractProperties).toHaveBeenCalledWith('物件概要', id);
      expect(extractText).not.toHaveBeenCalled();
      expect(store.getDocument(id)).toMatchObject({
        llmStatus: 'done',
        properties: PROPERTIES,
        extractedModel: 'model-b',
      });
    });

    test('runs OCR then LLM over two runs', async () => {
      const id = store.createDocument('flyer.pdf', 'abc');
      extractText.mockResolvedValue('text');
      extractProperties.mockResolvedValue({
        properties: PROPERTIES,
        modelUsed: 'model-a',
      });

      await engine.run(id);
      await engine.run(id);

      expect(store.getDocument(id)).toMatchObject({
        ocrStatus: 'done',
        llmStatus: 'done',
      });
    });

    test('returns the stage to pending on a transient failure', async () => {
      const id = ocrDone();
      extractProperties.mockRejectedValue(new Error('socket hang up'));

      const result = await engine.run(id);

      expect(result.outcome).toBe('llm-failed');
      expect(store.getDocument(id)).toMatchObject({
        ocrStatus: 'done',
        llmStatus: 'pending',
        llmError: 'socket hang up',
        properties: null,
        retryCount: 1,
      });
    });

    test('keeps exhaustion retryable below the retry limit', async () => {
      const id = ocrDone();
      extractProperties.mockRejectedValue(exhausted());

      const result = await engine.run(id);

      expect(result.outcome).toBe('llm-failed');
      expect(store.getDocument(id)).toMatchObject({
        llmStatus: 'pending',
        retryCount: 1,
      });
    });

    test('marks exhaustion as failed at the retry limit', async () => {
      const id = ocrDone();
      store.incrementRetry(id);
      store.incrementRetry(id);
      extractProperties.mockRejectedValue(exhausted());

      const result = await engine.run(id);

      expect(result).toEqual({
        documentId: id,
        outcome: 'llm-exhausted',
        requeue: false,
        error: 'All model candidates failed: model-a (sparse)',
      });
      expect(store.getDocument(id)).toMatchObject({
        llmStatus: 'failed',
        llmError: 'All model candidates failed: model-a (sparse)',
        retryCount: 3,
      });
    });

    test('defers without using a retry when every candidate is rate-limited', async () => {
      const id = ocrDone();
      extractProperties.mockRejectedValue(rateLimited());

      const result = await engine.run(id);

      expect(result).toEqual({
        documentId: id,
        outcome: 'llm-deferred',
        requeue: false,
        error:
          'All model candidates failed: model-a (rate-limited), model-b (cooling-down)',
      });
      expect(store.getDocument(id)).toMatchObject({
        llmStatus: 'pending',
        llmError:
          'All model candidates failed: model-a (rate-limited), model-b (cooling-down)',
        retryCount: 0,
      });
    });

    test('keeps rate-limited documents pending at the retry limit', async () => {
      const id = ocrDone();
      store.incrementRetry(id);
      store.incrementRetry(id);
      store.incrementRetry(id);
      extractProperties.mockRejectedValue(rateLimited());

      for (let i = 0; i < 4; i++) {
        await engine.run(id);
      }

      expect(store.getDocument(id)).toMatchObject({
        llmStatus: 'pending',
        retryCount: 3,
      });
    });

    test('shares the retry budget with earlier OCR failures', async () => {
      const id = store.createDocument('flyer.pdf', 'shared-budget');
      extractText
        .mockRejectedValueOnce(new Error('OCR request failed: timeout'))
        .mockRejectedValueOnce(new Error('OCR request failed: timeout'))
        .mockResolvedValueOnce('価格 5800万円');
      extractProperties.mockRejectedValue(exhausted());

      await engine.run(id);
      await engine.run(id);
      await engine.run(id);
      const result = await engine.run(id);

      expect(result.outcome).toBe('llm-exhausted');
      expect(store.getDocument(id)).toMatchObject({
        ocrStatus: 'done',
        llmStatus: 'failed',
        retryCount: 3,
      });
    });

    test('does not fail transient errors permanently at the limit', async () => {
      const id = ocrDone();
      store.incrementRetry(id);
      store.incrementRetry(id);
      extractProperties.mockRejectedValue(new Error('502 Bad Gateway'));

      await engine.run(id);

      expect(store.getDocument(id)?.llmStatus).toBe('pending');
    });

    test('retries a failed LLM stage when run explicitly', async () => {
      const id = ocrDone();
      store.updateLlmStatus(id, 'failed');
      extractProperties.mockResolvedValue({
        properties: PROPERTIES,
        modelUsed: 'model-a',
      });

      const result = await engine.run(id);

      expect(result.outcome).toBe('llm-done');
    });

    test('resets both stages when OCR is done without text', async () => {
      const id = ocrDone('   ');

      const result = await engine.run(id);

      expect(result).toEqual({ documentId: id, outcome: 'healed', requeue: false });
      expect(extractProperties).not.toHaveBeenCalled();
      expect(store.getDocument(id)).toMatchObject({
        ocrStatus: 'pending',
        ocrText: null,
        llmStatus: 'pending',
      });
    });
  });

  test('heals a stale OCR processing state and runs OCR', async () => {
    const id = store.createDocument('flyer.pdf', 'abc');
    store.updateOcrStatus(id, 'processing');
    extractText.mockResolvedValue('text');

    const result = await engine.run(id);

    expect(result.outcome).toBe('ocr-done');
    expect(extractText).toHaveBeenCalledTimes(1);
  });

  test('heals a stale LLM processing state and runs the LLM', async () => {
    const id = ocrDone();
    store.updateLlmStatus(id, 'processing');
    extractProperties.mockResolvedValue({
      properties: PROPERTIES,
      modelUsed: 'model-a',
    });

    const result = await engine.run(id);

    expect(result.outcome).toBe('llm-done');
  });

  test('does nothing for a finished document', async () => {
    const id = ocrDone();
    store.updateLlmStatus(id, 'done', PROPERTIES, 'model-a');
    const before = readFileSync(dbPath, 'utf-8');

    const result = await engine.run(id);

    expect(result).toEqual({ documentId: id, outcome: 'idle', requeue: false });
    expect(extractText).not.toHaveBeenCalled();
    expect(extractProperties).not.toHaveBeenCalled();
    expect(readFileSync(dbPath, 'utf-8')).toBe(before);
  });

  test('reports a missing document', async () => {
    expect(await engine.run(99)).toEqual({
      documentId: 99,
      outcome: 'missing',
      requeue: false,
    });
  });

  test('never throws when the store fails', async () => {
    const id = store.createDocument('flyer.pdf', 'abc');
    vi.spyOn(store, 'getDocument').mockImplementation(() => {
      throw new Error('disk full');
    });

    const result = await engine.run(id);

    expect(result).toEqual({
      documentId: id,
      outcome: 'failed',
      requeue: false,
      error: 'disk full',
    });
    expect(store.getDocument).toHaveBeenCalled();
  });

  test('logs when the failure itself cannot be recorded', async () => {
    const id = store.createDocument('flyer.pdf', 'abc');
    extractText.mockImplementation(async () => {
      store.deleteDocument(id);
      throw new Error('timeout');
    });

    const result = await engine.run(id);

    expect(result.outcome).toBe('ocr-failed');
    expect(mockLogger.error).toHaveBeenCalledWith(
      `[PipelineEngine] [doc:${id}] Could not record failure: Document ${id} not found`,
    );
  });
});
