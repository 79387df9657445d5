import type { WorkerConfig } from './config-schema';

import { isPlainObject } from '@propscan/shared';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod/v4';

import { ConfigError } from './config-error';
import { workerConfigSchema } from './config-schema';

export interface LoadConfigOptions {
  /**
   * Explicit config file path (default: `PROPSCAN_CONFIG`, then ./config.json)
   */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface LoadedConfig {
  config: WorkerConfig;

  /**
   * Absolute path of the file the config was read from
   */
  configPath: string;

  /**
   * `config.dataDir` resolved against the config file's directory
   */
  dataDir: string;
}

function section(value: unknown): Record<string, unknown> {
  return isPlainObject(value) ? { ...value } : {};
}

function readJson(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw ConfigError.fromError(`Failed to parse ${path}`, error);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${path}`);
  }
  return parsed;
}

/**
 * Environment variables take precedence over file values
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const result = { ...raw };
  const ocr = section(raw.ocr);
  const llm = section(raw.llm);
  const pipeline = section(raw.pipeline);

  if (env.DATA_DIR) result.dataDir = env.DATA_DIR;
  if (env.LOG_LEVEL) result.logLevel = env.LOG_LEVEL.trim().toLowerCase();
  if (env.OCR_ENDPOINT) ocr.endpoint = env.OCR_ENDPOINT;
  if (env.OCR_MODEL) ocr.model = env.OCR_MODEL;
  if (env.OCR_API_KEY) ocr.apiKey = env.OCR_API_KEY;
  if (env.LLM_BASE_URL) llm.baseUrl = env.LLM_BASE_URL;
  if (env.LLM_API_KEY) llm.apiKey = env.LLM_API_KEY;
  if (env.PIPELINE_CONCURRENCY) {
    pipeline.concurrency = Number(env.PIPELINE_CONCURRENCY);
  }
  if (env.PIPELINE_RETRY_LIMIT) {
    pipeline.retryLimit = Number(env.PIPELINE_RETRY_LIMIT);
  }

  result.ocr = ocr;
  result.llm = llm;
  result.pipeline = pipeline;
  return result;
}

export function resolveConfigPath(options: LoadConfigOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  return resolve(cwd, options.configPath ?? env.PROPSCAN_CONFIG ?? 'config.json');
}

/**
 * Read, override and validate the worker configuration.
 *
 * @throws ConfigError when the file is missing, unparsable or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options);
  const raw = applyEnvOverrides(readJson(configPath), env);

  const result = workerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid config ${configPath}:\n${z.prettifyError(result.error)}`,
    );
  }

  return {
    config: result.data,
    configPath,
    dataDir: resolve(dirname(configPath), result.data.dataDir),
  };
}

/**
 * Write a new candidate model list back to the config file, leaving every
 * other value (and anything only set through the environment) untouched
 */
export function persistModelList(
  configPath: string,
  models: readonly string[],
): void {
  const raw = readJson(configPath);
  raw.llm = { ...section(raw.llm), models: [...models] };

  try {
    writeFileSync(configPath, `${JSON.stringify(raw, null, 2)}\n`);
  } catch (error) {
    throw ConfigError.fromError(`Failed to write ${configPath}`, error);
  }
}
