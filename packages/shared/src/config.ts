/**
 * Centralized Configuration
 *
 * Loaded once at startup from environment variables, validated, and passed
 * explicitly to the pipeline and generation clients.
 */

import { ConfigError } from './errors';
import type { LogLevel } from './logger';
import { isConfig, validateConfig } from './schemas';
import type { GenerationProvider, JsonScannerMode } from './types';

export interface Config {
  // HTTP
  port: number;
  maxUploadBytes: number;

  // Generation service
  generationProvider: GenerationProvider;
  generationUrl: string;
  generationModel: string;
  generationTimeoutMs: number;
  generationMaxTokens: number;
  openaiApiKey: string;
  openaiBaseUrl?: string;

  // Response sanitizing
  responseJsonScanner: JsonScannerMode;

  // Logging
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

/**
 * Build a Config from environment variables. Throws ConfigError when a value
 * is out of range or not one of the accepted options.
 */
export function loadConfig(env: Env = process.env): Config {
  const candidate = {
    // HTTP
    port: parseInt(env.PORT || '8000', 10),
    maxUploadBytes: parseInt(env.MAX_UPLOAD_BYTES || '10485760', 10),

    // Generation service
    generationProvider: env.GENERATION_PROVIDER || 'ollama',
    generationUrl: env.GENERATION_URL || 'http://127.0.0.1:11434/api/generate',
    generationModel: env.GENERATION_MODEL || 'llama3.2:3b',
    generationTimeoutMs: parseInt(env.GENERATION_TIMEOUT_MS || '60000', 10),
    generationMaxTokens: parseInt(env.GENERATION_MAX_TOKENS || '1500', 10),
    openaiApiKey: env.OPENAI_API_KEY || '',
    ...(env.OPENAI_BASE_URL ? { openaiBaseUrl: env.OPENAI_BASE_URL } : {}),

    // Response sanitizing
    responseJsonScanner: env.RESPONSE_JSON_SCANNER || 'balanced',

    // Logging
    logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
  };

  const validation = validateConfig(candidate);
  if (!validation.valid || !isConfig(candidate)) {
    throw new ConfigError(`Invalid configuration: ${(validation.errors ?? []).join('; ')}`);
  }

  return candidate;
}

export const config: Config = loadConfig();
