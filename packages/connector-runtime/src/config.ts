/**
 * @module @infra-connectors/connector-runtime/config
 * Environment configuration for connectors
 */

import { z } from 'zod';
import { ValidationFailureError } from '@infra-connectors/connector-contracts';
import type { LoggerLevel } from './logging.js';

const envSchema = z.object({
  INFRA_CONNECTORS_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  INFRA_CONNECTORS_INCUS_BIN: z.string().default('incus'),
  INFRA_CONNECTORS_LXC_BIN: z.string().default('lxc'),
  INFRA_CONNECTORS_AZURE_CACHE_SIZE: z.coerce.number().int().positive().default(8),
  INFRA_CONNECTORS_AZURE_SUBSCRIPTIONS: z.string().optional(),
  INFRA_CONNECTORS_TMPDIR: z.string().optional(),
});

export interface ConnectorConfig {
  logLevel: LoggerLevel;
  /** Binary invoked by the incus connector */
  incusBin: string;
  /** Binary invoked by the lxc connector */
  lxcBin: string;
  /** Capacity of the Azure inventory cache */
  azureCacheSize: number;
  /** Subscriptions the Resource Graph query is scoped to (empty: all accessible) */
  azureSubscriptions: string[];
  /** Parent directory for staging files (default: os.tmpdir()) */
  tempDir?: string;
}

/**
 * Read connector configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConnectorConfig(env: NodeJS.ProcessEnv = process.env): ConnectorConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('INFRA_CONNECTORS_') && value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? String(issue.path[0]) : undefined;
    throw new ValidationFailureError(
      `Invalid connector configuration: ${field ?? '<env>'}: ${issue?.message ?? 'invalid value'}`,
      field
    );
  }

  const parsed = result.data;
  return {
    logLevel: parsed.INFRA_CONNECTORS_LOG_LEVEL,
    incusBin: parsed.INFRA_CONNECTORS_INCUS_BIN,
    lxcBin: parsed.INFRA_CONNECTORS_LXC_BIN,
    azureCacheSize: parsed.INFRA_CONNECTORS_AZURE_CACHE_SIZE,
    azureSubscriptions: (parsed.INFRA_CONNECTORS_AZURE_SUBSCRIPTIONS ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
    tempDir: parsed.INFRA_CONNECTORS_TMPDIR,
  };
}
