import type { LoggerMethods } from '@propscan/logger';
import type { PropertyFields } from '@propscan/model';
import type { LanguageModel } from 'ai';

import type { CandidateAttempt } from '../errors/property-extraction-error';
import type { ModelCandidateList } from './model-candidate-list';

import { coercePropertyFields } from '@propscan/model';
import { PropscanError } from '@propscan/shared';
import { APICallError, RetryError, generateText } from 'ai';

import { PROPERTY_EXTRACTION } from '../config/constants';
import { CandidatesExhaustedError } from '../errors/property-extraction-error';
import { buildPropertyExtractionPrompt } from '../prompts/property-extraction-prompt';
import { toWesternYear } from '../utils/era-converter';
import { extractJsonObject } from '../utils/json-extractor';
import { countMeaningfulFields } from '../utils/meaningful-fields';

/**
 * Successful extraction tagged with the model that produced it
 */
export interface PropertyExtractionResult {
  properties: PropertyFields;
  modelUsed: string;
}

/** Options for PropertyExtractionClient */
export interface PropertyExtractionClientOptions {
  logger: LoggerMethods;

  /**
   * Live candidate list, read once per call
   */
  candidates: ModelCandidateList;

  /**
   * Builds the language model for a candidate id
   */
  resolveModel: (modelId: string) => LanguageModel;

  /**
   * Skip window after a rate-limit response (default: 60000)
   */
  cooldownMs?: number;

  /**
   * Minimum meaningful fields for an acceptable response (default: 3)
   */
  minMeaningfulFields?: number;

  /**
   * Timeout per candidate call in milliseconds (default: 120000)
   */
  timeoutMs?: number;

  /**
   * Clock in epoch milliseconds (default: Date.now)
   */
  now?: () => number;
}

/**
 * PropertyExtractionClient
 *
 * Turns OCR text into property fields by trying each model candidate in
 * order until one returns a parseable, sufficiently populated JSON object.
 *
 * Rate-limited candidates (HTTP 429) are put on cooldown and skipped by
 * later calls until the window passes. Every other failure just moves on to
 * the next candidate. Cooldown state lives in memory for the lifetime of the
 * client; concurrent calls share it with last-write-wins updates.
 */
export class PropertyExtractionClient {
  private readonly logger: LoggerMethods;
  private readonly candidates: ModelCandidateList;
  private readonly resolveModel: (modelId: string) => LanguageModel;
  private readonly cooldownMs: number;
  private readonly minMeaningfulFields: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly rateLimitedAt = new Map<string, number>();

  constructor(options: PropertyExtractionClientOptions) {
    this.logger = options.logger;
    this.candidates = options.candidates;
    this.resolveModel = options.resolveModel;
    this.cooldownMs = options.cooldownMs ?? PROPERTY_EXTRACTION.COOLDOWN_MS;
    this.minMeaningfulFields =
      options.minMeaningfulFields ?? PROPERTY_EXTRACTION.MIN_MEANINGFUL_FIELDS;
    this.timeoutMs = options.timeoutMs ?? PROPERTY_EXTRACTION.TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Extract property fields from OCR text.
   *
   * @throws CandidatesExhaustedError when no candidate produced a usable
   * response, including when the list is empty
   */
  async extractProperties(
    ocrText: string,
    documentId: number,
  ): Promise<PropertyExtractionResult> {
    const tag = `[PropertyExtractionClient] [doc:${documentId}]`;
    const candidates = this.candidates.snapshot();

    if (candidates.length === 0) {
      this.logger.error(`${tag} No model candidates configured`);
      throw new CandidatesExhaustedError([]);
    }

    this.logger.info(
      `${tag} Extracting properties (${ocrText.length} chars, ${candidates.length} candidate(s))`,
    );

    const prompt = buildPropertyExtractionPrompt(ocrText);
    const attempts: CandidateAttempt[] = [];

    for (const modelId of candidates) {
      const attempt = await this.tryCandidate(modelId, prompt, tag);
      if ('properties' in attempt) {
        this.logger.info(`${tag} Extracted with ${modelId}`);
        return attempt;
      }
      attempts.push(attempt);
    }

    const error = new CandidatesExhaustedError(attempts);
    this.logger.error(`${tag} ${error.message}`);
    throw error;
  }

  /**
   * Remaining cooldown for a candidate in milliseconds (0 when available)
   */
  getCooldownRemaining(modelId: string): number {
    const since = this.rateLimitedAt.get(modelId);
    if (since === undefined) {
      return 0;
    }
    return Math.max(0, this.cooldownMs - (this.now() - since));
  }

  private async tryCandidate(
    modelId: string,
    prompt: string,
    tag: string,
  ): Promise<PropertyExtractionResult | CandidateAttempt> {
    const remaining = this.getCooldownRemaining(modelId);
    if (remaining > 0) {
      const seconds = Math.ceil(remaining / 1000);
      this.logger.info(
        `${tag} ${modelId} cooling down (${seconds}s left), skipping`,
      );
      return {
        modelId,
        outcome: 'cooling-down',
        detail: `${seconds}s left`,
      };
    }

    let responseText: string;
    try {
      responseText = await this.request(modelId, prompt);
    } catch (error) {
      if (this.isRateLimited(error)) {
        this.rateLimitedAt.set(modelId, this.now());
        this.logger.warn(`${tag} ${modelId} rate limited, cooling down`);
        return { modelId, outcome: 'rate-limited', detail: 'HTTP 429' };
      }
      const detail = PropscanError.getErrorMessage(error);
      this.logger.warn(`${tag} ${modelId} request failed: ${detail}`);
      return { modelId, outcome: 'request-failed', detail };
    }

    let parsed: PropertyFields;
    try {
      parsed = this.parse(responseText);
    } catch (error) {
      const detail = PropscanError.getErrorMessage(error);
      this.logger.warn(`${tag} ${modelId} returned unparsable output: ${detail}`);
      return { modelId, outcome: 'unparsable', detail };
    }

    const properties = this.normalize(parsed);
    const meaningful = countMeaningfulFields(properties);
    if (meaningful < this.minMeaningfulFields) {
      this.logger.warn(
        `${tag} ${modelId} returned only ${meaningful} meaningful field(s), trying next`,
      );
      return {
        modelId,
        outcome: 'sparse',
        detail: `${meaningful} meaningful field(s)`,
      };
    }

    return { properties, modelUsed: modelId };
  }

  private async request(modelId: string, prompt: string): Promise<string> {
    const result = await generateText({
      model: this.resolveModel(modelId),
      prompt,
      temperature: PROPERTY_EXTRACTION.TEMPERATURE,
      maxOutputTokens: PROPERTY_EXTRACTION.MAX_OUTPUT_TOKENS,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(this.timeoutMs),
    });
    return result.text;
  }

  private parse(responseText: string): PropertyFields {
    return coercePropertyFields(extractJsonObject(responseText));
  }

  /**
   * Drop bookkeeping keys and convert `build_year` to a Western year
   */
  private normalize(fields: PropertyFields): PropertyFields {
    const properties: PropertyFields = { ...fields };
    for (const key of Object.keys(properties)) {
      if (key.startsWith('_')) {
        delete properties[key];
      }
    }
    if (
      typeof properties.build_year === 'string' ||
      typeof properties.build_year === 'number'
    ) {
      properties.build_year = toWesternYear(properties.build_year);
    }
    return properties;
  }

  private isRateLimited(error: unknown): boolean {
    if (RetryError.isInstance(error)) {
      return this.isRateLimited(error.lastError);
    }
    return APICallError.isInstance(error) && error.statusCode === 429;
  }
}
