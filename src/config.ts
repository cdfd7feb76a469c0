/**
 * config.ts — Environment-driven configuration for applications.
 *
 * The client itself only needs an API key string; this module is a
 * convenience for programs that keep the key in the environment or a .env file.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { createSession, BASE_URL, DEFAULT_API_VERSION, type Session } from './client/session.js';
import { ConfigError } from './client/types.js';
import { createConsoleLogger, type LogLevel } from './logger.js';

const EnvSchema = z.object({
  CONNECT_API_KEY: z.string().min(1, 'is required'),
  CONNECT_BASE_URL: z.string().url().default(BASE_URL),
  CONNECT_API_VERSION: z.string().min(1).default(DEFAULT_API_VERSION),
  CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CONNECT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('silent'),
});

export interface ConnectConfig {
  apiKey: string;
  baseUrl: string;
  apiVersion: string;
  timeoutMs: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConnectConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`),
    );
  }
  const parsed = result.data;
  return {
    apiKey: parsed.CONNECT_API_KEY,
    baseUrl: parsed.CONNECT_BASE_URL,
    apiVersion: parsed.CONNECT_API_VERSION,
    timeoutMs: parsed.CONNECT_TIMEOUT_MS,
    logLevel: parsed.CONNECT_LOG_LEVEL,
  };
}

export interface SessionFromEnvOptions {
  // .env file to read; variables already set in the environment win
  envPath?: string;
  setAsDefault?: boolean;
}

export function createSessionFromEnv(options: SessionFromEnvOptions = {}): Session {
  loadDotenv({ path: options.envPath });
  const config = loadConfig();
  return createSession(config.apiKey, {
    setAsDefault: options.setAsDefault ?? true,
    baseUrl: config.baseUrl,
    apiVersion: config.apiVersion,
    timeoutMs: config.timeoutMs,
    logger: createConsoleLogger(config.logLevel),
  });
}
