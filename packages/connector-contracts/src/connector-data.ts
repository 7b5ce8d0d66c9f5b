/**
 * @module @infra-connectors/connector-contracts/connector-data
 * Per-target configuration options understood by executing connectors
 */

import { z } from 'zod';
import { ValidationFailureError } from './errors.js';

export const connectorDataSchema = z
  .object({
    /** Directory to run the command in */
    cwd: z.string().min(1).optional(),
    /** Environment variables to set */
    env: z
      .record(
        z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Invalid environment variable name'),
        z.string()
      )
      .optional(),
    /** Numeric user ID to run the command as */
    user: z.number().int().nonnegative().optional(),
  })
  .strict();

export type ConnectorData = z.infer<typeof connectorDataSchema>;

/**
 * Validate connector data coming from inventory or user config.
 */
export function parseConnectorData(input: unknown): ConnectorData {
  const result = connectorDataSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    throw new ValidationFailureError(
      `Invalid connector data: ${issues.map((i) => `${i.path || '<root>'}: ${i.message}`).join('; ')}`,
      first?.path || undefined,
      { issues }
    );
  }
  return result.data;
}

/**
 * Overlay per-call data on top of session data. `env` maps are merged.
 */
export function mergeConnectorData(base: ConnectorData, override?: ConnectorData): ConnectorData {
  if (!override) {
    return base;
  }
  const env = base.env || override.env ? { ...(base.env ?? {}), ...(override.env ?? {}) } : undefined;
  return {
    cwd: override.cwd ?? base.cwd,
    env,
    user: override.user ?? base.user,
  };
}
