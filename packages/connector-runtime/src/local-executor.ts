/**
 * @module @infra-connectors/connector-runtime/local-executor
 *
 * CommandExecutor that spawns processes on the controlling machine.
 *
 * Commands run in argv form through execa; no local shell is involved,
 * so only strings that cross the target's shell boundary need quoting.
 * A non-zero exit resolves with `success: false`. A process that never
 * produced an exit code (missing binary, spawn refused, killed on
 * timeout) throws ExecutionFailureError.
 */

import type { Writable } from 'node:stream';
import { execa } from 'execa';
import {
  ExecutionFailureError,
  formatCommandLine,
  noopLogger,
  quoteShellArg,
  type CommandExecutor,
  type CommandResult,
  type CommandSpec,
  type ConnectorLogger,
  type RunOptions,
  type ShellQuoter,
} from '@infra-connectors/connector-contracts';

export interface LocalCommandExecutorOptions {
  logger?: ConnectorLogger;
  /** Where printOutput/printInput echo to (default: process streams) */
  stdout?: Writable;
  stderr?: Writable;
  /** Used to render command lines for printInput and logs */
  quote?: ShellQuoter;
}

interface ExitedProcess {
  exitCode: number;
  stdout: string;
  stderr: string;
}

function isExitedProcess(error: unknown): error is ExitedProcess {
  return (
    typeof error === 'object' &&
    error !== null &&
    'exitCode' in error &&
    typeof error.exitCode === 'number' &&
    error.exitCode >= 0 &&
    'stdout' in error &&
    typeof error.stdout === 'string' &&
    'stderr' in error &&
    typeof error.stderr === 'string'
  );
}

export class LocalCommandExecutor implements CommandExecutor {
  private readonly logger: ConnectorLogger;
  private readonly stdout: Writable;
  private readonly stderr: Writable;
  private readonly quote: ShellQuoter;

  constructor(options: LocalCommandExecutorOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.quote = options.quote ?? quoteShellArg;
  }

  async run(spec: CommandSpec, options: RunOptions = {}): Promise<CommandResult> {
    const startTime = Date.now();
    const commandLine = formatCommandLine(spec, this.quote);

    if (options.printInput) {
      this.stdout.write(`>>> ${commandLine}\n`);
    }

    this.logger.debug('Running local command', { command: commandLine });

    try {
      const subprocess = execa(spec.command, spec.args, {
        input: typeof options.input === 'string' || options.input === undefined
          ? options.input
          : Buffer.from(options.input),
        timeout: options.timeoutMs,
        stripFinalNewline: false,
      });

      if (options.printOutput) {
        subprocess.stdout?.pipe(this.stdout, { end: false });
        subprocess.stderr?.pipe(this.stderr, { end: false });
      }

      const result = await subprocess;
      return this.toResult(result, startTime, commandLine);
    } catch (error: unknown) {
      if (isExitedProcess(error)) {
        return this.toResult(error, startTime, commandLine);
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Local command could not be dispatched', { command: commandLine, error: message });
      throw new ExecutionFailureError(commandLine, message, { cause: error });
    }
  }

  private toResult(exited: ExitedProcess, startTime: number, commandLine: string): CommandResult {
    const timingMs = Date.now() - startTime;
    this.logger.debug('Local command finished', {
      command: commandLine,
      exitCode: exited.exitCode,
      timingMs,
    });

    return {
      success: exited.exitCode === 0,
      exitCode: exited.exitCode,
      stdout: exited.stdout,
      stderr: exited.stderr,
      timingMs,
    };
  }
}
