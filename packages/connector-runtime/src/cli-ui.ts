/**
 * @module @infra-connectors/connector-runtime/cli-ui
 * ConnectorUI for terminals: chalk for colours, ora for spinners.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import ora from 'ora';
import type { ConnectorUI, Spinner } from '@infra-connectors/connector-contracts';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export interface CliUIOptions {
  /**
   * Verbosity level for output filtering
   * - quiet: Only errors
   * - normal: Everything but debug
   * - verbose: All including debug
   */
  verbosity?: Verbosity;
  /** Output stream (default: process.stderr) */
  stream?: NodeJS.WritableStream;
  /** Force colours on or off (default: autodetect) */
  colors?: boolean;
}

const silentSpinner: Spinner = {
  update: () => {},
  succeed: () => {},
  fail: () => {},
  stop: () => {},
};

export class CliUI implements ConnectorUI {
  private readonly verbosity: Verbosity;
  private readonly stream: NodeJS.WritableStream;
  private readonly chalk: ChalkInstance;

  constructor(options: CliUIOptions = {}) {
    this.verbosity = options.verbosity ?? 'normal';
    this.stream = options.stream ?? process.stderr;
    this.chalk = options.colors === undefined ? chalk : new Chalk({ level: options.colors ? 1 : 0 });
  }

  info(message: string): void {
    if (this.verbosity !== 'quiet') {
      this.line(`${this.chalk.cyan('→')} ${message}`);
    }
  }

  success(message: string): void {
    if (this.verbosity !== 'quiet') {
      this.line(`${this.chalk.green('✓')} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.verbosity !== 'quiet') {
      this.line(`${this.chalk.yellow('!')} ${message}`);
    }
  }

  error(error: Error | string): void {
    // Errors always shown
    const message = error instanceof Error ? error.message : error;
    this.line(`${this.chalk.red('✗')} ${message}`);
  }

  debug(message: string): void {
    if (this.verbosity === 'verbose') {
      this.line(this.chalk.dim(message));
    }
  }

  spinner(message: string): Spinner {
    if (this.verbosity === 'quiet') {
      return silentSpinner;
    }

    const instance = ora({ text: message, stream: this.stream }).start();
    return {
      update: (text) => {
        instance.text = text;
      },
      succeed: (text) => {
        instance.succeed(text);
      },
      fail: (text) => {
        instance.fail(text);
      },
      stop: () => {
        instance.stop();
      },
    };
  }

  private line(text: string): void {
    this.stream.write(`${text}\n`);
  }
}
