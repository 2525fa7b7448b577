/**
 * Configuration Management
 *
 * Reads the proxy settings from the environment, validates them and hands
 * back a frozen value that is injected into the handler and server.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { Logger } from './logger.js';

export const DEFAULT_MODEL = 'gemini-1.5-flash-latest';
export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
export const DEFAULT_CORS_ORIGIN = 'http://localhost:3000';

/** Most characters of the key shown in the startup log. */
const KEY_PREFIX_LENGTH = 8;

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

/**
 * Environment variables understood by the proxy
 */
const EnvSchema = z.object({
  GOOGLE_API_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  GEMINI_MODEL: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_MODEL)),
  GEMINI_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
  CORS_ORIGIN: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_CORS_ORIGIN)),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).default(8000)),
  HOST: z.preprocess(emptyToUndefined, z.string().default('0.0.0.0')),
  UPSTREAM_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(30_000)),
});

export interface Config {
  /** Upstream credential; absent means every chat request is refused. */
  apiKey: string | undefined;
  model: string;
  baseUrl: string;
  /** The single front-end origin allowed to call the proxy. */
  corsOrigin: string;
  port: number;
  host: string;
  upstreamTimeoutMs: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Load and validate config from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;
  return Object.freeze({
    apiKey: e.GOOGLE_API_KEY,
    model: e.GEMINI_MODEL,
    baseUrl: e.GEMINI_BASE_URL.replace(/\/+$/, ''),
    // Origin headers never carry a trailing slash
    corsOrigin: new URL(e.CORS_ORIGIN).origin,
    port: e.PORT,
    host: e.HOST,
    upstreamTimeoutMs: e.UPSTREAM_TIMEOUT_MS,
  });
}

/**
 * Merge overrides (CLI flags, tests) over a loaded config
 */
export function withOverrides(config: Config, overrides: Partial<Config>): Config {
  return Object.freeze({
    apiKey: overrides.apiKey ?? config.apiKey,
    model: overrides.model ?? config.model,
    baseUrl: overrides.baseUrl ?? config.baseUrl,
    corsOrigin: overrides.corsOrigin ?? config.corsOrigin,
    port: overrides.port ?? config.port,
    host: overrides.host ?? config.host,
    upstreamTimeoutMs: overrides.upstreamTimeoutMs ?? config.upstreamTimeoutMs,
  });
}

export function hasApiKey(config: Config): boolean {
  return config.apiKey !== undefined && config.apiKey.length > 0;
}

/** First characters of the key, never more than half of it. */
export function apiKeyPrefix(apiKey: string): string {
  return apiKey.slice(0, Math.min(KEY_PREFIX_LENGTH, Math.floor(apiKey.length / 2)));
}

/**
 * Log whether the credential was found without printing the secret
 */
export function describeApiKey(config: Config, logger: Logger): void {
  if (config.apiKey === undefined) {
    logger.error('Error: GOOGLE_API_KEY not found in environment variables.');
    return;
  }
  const prefix = apiKeyPrefix(config.apiKey);
  logger.info(`Google API Key loaded (first ${prefix.length} chars): ${prefix}`);
}
