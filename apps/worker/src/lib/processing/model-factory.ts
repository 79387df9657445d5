import type { WorkerConfig } from '../config/config-schema';
import type { LanguageModel } from 'ai';

import { createOpenAI } from '@ai-sdk/openai';

type OpenAIProvider = ReturnType<typeof createOpenAI>;

/**
 * Builds language models for both stages from the worker config.
 *
 * Both services speak the OpenAI chat-completions protocol: the OCR model is
 * served by a local vLLM instance, the extraction candidates by OpenRouter.
 * Providers are created lazily and reused.
 */
export class ModelFactory {
  private ocrProvider: OpenAIProvider | null = null;
  private llmProvider: OpenAIProvider | null = null;

  constructor(private readonly config: WorkerConfig) {}

  createOcrModel(): LanguageModel {
    return this.getOcrProvider().chat(this.config.ocr.model);
  }

  /**
   * Language model for one extraction candidate id, e.g.
   * `google/gemini-2.0-flash-exp:free`
   */
  createLlmModel(modelId: string): LanguageModel {
    return this.getLlmProvider().chat(modelId);
  }

  private getOcrProvider(): OpenAIProvider {
    if (!this.ocrProvider) {
      this.ocrProvider = createOpenAI({
        baseURL: this.config.ocr.endpoint,
        // vLLM accepts any key unless started with --api-key
        apiKey: this.config.ocr.apiKey ?? 'EMPTY',
      });
    }
    return this.ocrProvider;
  }

  private getLlmProvider(): OpenAIProvider {
    if (!this.llmProvider) {
      this.llmProvider = createOpenAI({
        baseURL: this.config.llm.baseUrl,
        apiKey: this.config.llm.apiKey,
        headers: { 'X-Title': 'propscan' },
      });
    }
    return this.llmProvider;
  }
}
