/**
 * @module @infra-connectors/connector-contracts/command
 * Command specification and the local execution capability
 */

import type { PrintOptions } from './types.js';

/**
 * Command in argv form. Nothing between `command` and the process
 * passes through a local shell.
 */
export interface CommandSpec {
  /** Executable name or path */
  command: string;
  /** Command arguments */
  args: string[];
}

/**
 * Captured result of a finished process.
 */
export interface CommandResult {
  /** Whether the command succeeded (exitCode === 0) */
  success: boolean;
  /** Process exit code */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Wall time in milliseconds */
  timingMs: number;
}

/**
 * Options for CommandExecutor.run().
 */
export interface RunOptions extends PrintOptions {
  /** Data written to the process stdin */
  input?: string | Uint8Array;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Runs processes on the controlling machine.
 *
 * Implementations resolve with `success: false` when the process exits
 * non-zero and throw ExecutionFailureError only when it could not be
 * started.
 */
export interface CommandExecutor {
  run(spec: CommandSpec, options?: RunOptions): Promise<CommandResult>;
}
