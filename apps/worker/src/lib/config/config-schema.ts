import { z } from 'zod/v4';

const positiveInt = z.number().int().positive();

export const workerConfigSchema = z.object({
  /** Holds the database file and stored uploads; relative to the config file */
  dataDir: z.string().min(1).default('./data'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  ocr: z.object({
    /** Base URL of an OpenAI-compatible vision endpoint */
    endpoint: z.url(),
    model: z.string().min(1),
    apiKey: z.string().optional(),
    timeoutMs: positiveInt.default(300_000),
    pageConcurrency: positiveInt.default(1),
  }),

  llm: z.object({
    baseUrl: z.url(),
    apiKey: z.string().optional(),
    /** Candidate model ids in trial order */
    models: z.array(z.string().trim().min(1)),
    cooldownMs: z.number().int().nonnegative().default(60_000),
    minMeaningfulFields: positiveInt.default(3),
    timeoutMs: positiveInt.default(120_000),
  }),

  pipeline: z
    .object({
      concurrency: positiveInt.default(3),
      batchSize: positiveInt.default(10),
      pollIntervalMs: positiveInt.default(1000),
      retryLimit: positiveInt.default(5),
      attemptLimit: positiveInt.optional(),
      softFailureLimit: positiveInt.optional(),
    })
    .prefault({}),
});

export type WorkerConfig = z.infer<typeof workerConfigSchema>;
