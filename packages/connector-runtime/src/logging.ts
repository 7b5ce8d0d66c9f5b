/**
 * @module @infra-connectors/connector-runtime/logging
 *
 * Structured JSON-lines logger. One line per entry on stderr (or a
 * custom sink), filtered by level.
 */

import type { ConnectorLogger, LogFields, LogLevel } from '@infra-connectors/connector-contracts';

export type LoggerLevel = LogLevel | 'silent';

const LEVEL_ORDER: Record<LoggerLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConnectorLoggerOptions {
  /** Minimum level written (default: warn) */
  level?: LoggerLevel;
  /** Receives each serialized line (default: process.stderr) */
  sink?: (line: string) => void;
  timestamp?: () => string;
}

function defaultSink(line: string): void {
  process.stderr.write(`${line}\n`);
}

function defaultTimestamp(): string {
  return new Date().toISOString();
}

export function createConnectorLogger(
  scope: string,
  context: LogFields = {},
  options: ConnectorLoggerOptions = {}
): ConnectorLogger {
  const threshold = LEVEL_ORDER[options.level ?? 'warn'];
  const sink = options.sink ?? defaultSink;
  const timestamp = options.timestamp ?? defaultTimestamp;

  function write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    sink(
      JSON.stringify({
        ts: timestamp(),
        level,
        scope,
        msg: message,
        ...context,
        ...fields,
      })
    );
  }

  return {
    debug(message, fields) {
      write('debug', message, fields);
    },
    info(message, fields) {
      write('info', message, fields);
    },
    warn(message, fields) {
      write('warn', message, fields);
    },
    error(message, fields) {
      if (fields instanceof Error) {
        write('error', message, { error: fields.message, stack: fields.stack });
        return;
      }
      write('error', message, fields);
    },
    child(fields) {
      return createConnectorLogger(scope, { ...context, ...fields }, options);
    },
  };
}
