import { z } from 'zod';
import {
  LOG_LEVELS,
  booleanVar,
  createLogger,
  integerVar,
  isLogLevel,
  loadEnvConfig,
  stringVar,
  urlVar
} from '@hcloud-sdk/shared';
import type { EnvSource, LogLevel } from '@hcloud-sdk/shared';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_TIMEOUT_MS } from './actions';
import type { WaitForActionOptions } from './actions';
import { HcloudClient } from './hcloudClient';
import { DEFAULT_BASE_URL } from './transport';

const DEFAULT_TIMEOUT_MS = 30_000;

const envSchema = z.object({
  HCLOUD_TOKEN: stringVar({ required: true, description: 'HCLOUD_TOKEN' }),
  HCLOUD_ENDPOINT: urlVar({ defaultValue: DEFAULT_BASE_URL }),
  HCLOUD_TIMEOUT_MS: integerVar({ defaultValue: DEFAULT_TIMEOUT_MS, min: 0 }),
  HCLOUD_VERIFY_SSL: booleanVar({ defaultValue: true }),
  HCLOUD_POLL_INTERVAL_MS: integerVar({ defaultValue: DEFAULT_POLL_INTERVAL_MS, min: 100 }),
  HCLOUD_POLL_TIMEOUT_MS: integerVar({ defaultValue: DEFAULT_POLL_TIMEOUT_MS, min: 1_000 }),
  HCLOUD_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true, oneOf: LOG_LEVELS })
});

export interface HcloudConfig {
  token: string;
  endpoint: string;
  timeoutMs: number;
  verifySsl: boolean;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  logLevel: LogLevel;
}

export function loadHcloudConfig(env?: EnvSource): HcloudConfig {
  const parsed = loadEnvConfig(envSchema, { env, context: 'hcloud' });
  const logLevel = parsed.HCLOUD_LOG_LEVEL ?? 'info';
  return {
    token: parsed.HCLOUD_TOKEN ?? '',
    endpoint: parsed.HCLOUD_ENDPOINT ?? DEFAULT_BASE_URL,
    timeoutMs: parsed.HCLOUD_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    verifySsl: parsed.HCLOUD_VERIFY_SSL ?? true,
    pollIntervalMs: parsed.HCLOUD_POLL_INTERVAL_MS ?? DEFAULT_POLL_INTERVAL_MS,
    pollTimeoutMs: parsed.HCLOUD_POLL_TIMEOUT_MS ?? DEFAULT_POLL_TIMEOUT_MS,
    logLevel: isLogLevel(logLevel) ? logLevel : 'info'
  };
}

export function pollOptionsFromConfig(config: HcloudConfig): WaitForActionOptions {
  return { intervalMs: config.pollIntervalMs, timeoutMs: config.pollTimeoutMs };
}

export function createHcloudClientFromEnv(env?: EnvSource): HcloudClient {
  const config = loadHcloudConfig(env);
  return new HcloudClient(
    {
      token: config.token,
      baseUrl: config.endpoint,
      timeoutMs: config.timeoutMs,
      verifySsl: config.verifySsl,
      logger: createLogger({ level: config.logLevel, name: 'hcloud' })
    },
    pollOptionsFromConfig(config)
  );
}
