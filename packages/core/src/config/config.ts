import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { relayBaseUrl } from '../constants.js';
import { RelayError } from '../errors/index.js';
import { LOG_LEVELS, type LogLevel } from '../logger.js';

type Env = Record<string, string | undefined>;

export const DEFAULT_RELAY_URL = 'ws://localhost:8000';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_TIMEOUT_MS = 300_000;

export function defaultKeyPath(): string {
  return join(homedir(), '.agentlink', 'keys', 'agent.key');
}

const blankToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const relayUrl = z.preprocess(
  blankToUndefined,
  z
    .string()
    .default(DEFAULT_RELAY_URL)
    .refine((value) => /^wss?:\/\/[^/\s]+/.test(value), 'must be a ws:// or wss:// URL')
    .transform(relayBaseUrl),
);

const clientSchema = z.object({
  AGENTLINK_RELAY_URL: relayUrl,
  AGENTLINK_TIMEOUT_MS: positiveInt(DEFAULT_TIMEOUT_MS),
  AGENTLINK_KEY_PATH: z.preprocess(blankToUndefined, z.string().optional()),
});

const relaySchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65_535).default(8000)),
  HOST: z.preprocess(blankToUndefined, z.string().default('0.0.0.0')),
  AGENTLINK_TIMEOUT_MS: positiveInt(DEFAULT_TIMEOUT_MS),
  AGENTLINK_MAX_TIMEOUT_MS: positiveInt(DEFAULT_MAX_TIMEOUT_MS),
  AGENTLINK_SWEEP_INTERVAL_MS: positiveInt(1000),
  AGENTLINK_HEARTBEAT_INTERVAL_MS: positiveInt(30_000),
  AGENTLINK_LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
});

export interface ClientConfig {
  relayUrl: string;
  timeoutMs: number;
  keyPath: string;
}

export interface RelayConfig {
  port: number;
  host: string;
  timeoutMs: number;
  maxTimeoutMs: number;
  sweepIntervalMs: number;
  heartbeatIntervalMs: number;
  logLevel: LogLevel;
}

function parseEnv<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, env: Env): Output {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue ? issue.path.join('.') : 'environment';
    throw new RelayError('INVALID_CONFIG', `Invalid ${variable}: ${issue?.message ?? 'unknown error'}`, {
      variable,
    });
  }
  return result.data;
}

/**
 * Client settings from the environment. A value given in `overrides` wins, and
 * its variable is not read at all.
 */
export function loadClientConfig(env: Env = process.env, overrides: Partial<ClientConfig> = {}): ClientConfig {
  const source: Env = { ...env };
  if (overrides.relayUrl !== undefined) delete source.AGENTLINK_RELAY_URL;
  if (overrides.timeoutMs !== undefined) delete source.AGENTLINK_TIMEOUT_MS;
  if (overrides.keyPath !== undefined) delete source.AGENTLINK_KEY_PATH;

  const parsed = parseEnv(clientSchema, source);
  return {
    relayUrl: overrides.relayUrl ?? parsed.AGENTLINK_RELAY_URL,
    timeoutMs: overrides.timeoutMs ?? parsed.AGENTLINK_TIMEOUT_MS,
    keyPath: overrides.keyPath ?? parsed.AGENTLINK_KEY_PATH ?? defaultKeyPath(),
  };
}

export function loadRelayConfig(env: Env = process.env): RelayConfig {
  const parsed = parseEnv(relaySchema, env);
  if (parsed.AGENTLINK_TIMEOUT_MS > parsed.AGENTLINK_MAX_TIMEOUT_MS) {
    throw new RelayError('INVALID_CONFIG', 'Invalid AGENTLINK_TIMEOUT_MS: exceeds AGENTLINK_MAX_TIMEOUT_MS', {
      variable: 'AGENTLINK_TIMEOUT_MS',
    });
  }
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    timeoutMs: parsed.AGENTLINK_TIMEOUT_MS,
    maxTimeoutMs: parsed.AGENTLINK_MAX_TIMEOUT_MS,
    sweepIntervalMs: parsed.AGENTLINK_SWEEP_INTERVAL_MS,
    heartbeatIntervalMs: parsed.AGENTLINK_HEARTBEAT_INTERVAL_MS,
    logLevel: parsed.AGENTLINK_LOG_LEVEL,
  };
}
