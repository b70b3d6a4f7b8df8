/**
 * workgraph Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Boolean env flag. `z.coerce.boolean()` treats "false" as true, so the
 * accepted spellings are listed explicitly.
 */
const envBoolean = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Retry configuration schema
 */
const retryConfigSchema = z.object({
  /** Retry failed units during a full run */
  retryFailed: envBoolean.default(true),
  /** Total attempts per unit during a full run (1-10) */
  maxRetries: z.coerce.number().int().min(1).max(10).default(3),
  /** Fixed delay between attempts in milliseconds (0 - 1min) */
  delayMs: z.coerce.number().int().min(0).max(60000).default(1000),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3001),
  host: z.string().default('0.0.0.0'),
  apiKey: z.string().min(1).optional(),

  // Execution
  retry: retryConfigSchema,

  // Execution log page size when no limit is given
  logPageSize: z.coerce.number().int().min(1).max(1000).default(100),

  // Optional phase catalog (YAML or JSON) replacing config/phases.yaml
  phasesFile: z.string().min(1).optional(),
});

export type WorkgraphConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): WorkgraphConfig {
  const raw = {
    port: process.env.WORKGRAPH_PORT,
    host: process.env.WORKGRAPH_HOST,
    apiKey: process.env.WORKGRAPH_API_KEY || undefined,
    retry: {
      retryFailed: process.env.WORKGRAPH_RETRY_FAILED,
      maxRetries: process.env.WORKGRAPH_MAX_RETRIES,
      delayMs: process.env.WORKGRAPH_RETRY_DELAY_MS,
    },
    logPageSize: process.env.WORKGRAPH_LOG_PAGE_SIZE,
    phasesFile: process.env.WORKGRAPH_PHASES_FILE || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      port: result.data.port,
      retryFailed: result.data.retry.retryFailed,
      maxRetries: result.data.retry.maxRetries,
      retryDelayMs: result.data.retry.delayMs,
      phasesFile: result.data.phasesFile ?? null,
      authEnabled: result.data.apiKey !== undefined,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: WorkgraphConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): WorkgraphConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Get retry configuration for run defaults
 */
export function getRetryConfig(): RetryConfig {
  return getConfig().retry;
}
