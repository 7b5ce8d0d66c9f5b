/**
 * @module @infra-connectors/connector-contracts/errors
 *
 * Error classes for the connector layer.
 *
 * Every failure surfaces to the caller as a ConnectorLayerError subclass.
 * Nothing here retries; the message carries the captured remote text
 * verbatim so the operator sees what the CLI or API said.
 */

/**
 * Standardized error codes.
 */
export type ConnectorErrorCode =
  | 'DISCOVERY_FAILED'      // list/query call failed or returned malformed output
  | 'EXECUTION_FAILED'      // command could not be dispatched at all
  | 'TRANSFER_FAILED'       // file push/pull reported failure
  | 'VALIDATION_FAILED'     // filter field, connector data or config rejected
  | 'UNSUPPORTED_OPERATION' // connector does not handle this operation
  | 'UNKNOWN_CONNECTOR'     // no connector registered under that kind
  | 'UNKNOWN_ERROR';

/**
 * Serialized error shape.
 */
export interface ConnectorErrorInfo {
  message: string;
  code: ConnectorErrorCode;
  stack?: string;
  details?: Record<string, unknown>;
}

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<ConnectorErrorCode>([
  'DISCOVERY_FAILED',
  'EXECUTION_FAILED',
  'TRANSFER_FAILED',
  'VALIDATION_FAILED',
  'UNSUPPORTED_OPERATION',
  'UNKNOWN_CONNECTOR',
  'UNKNOWN_ERROR',
]);

/**
 * Type guard for ConnectorErrorCode.
 */
export function isKnownErrorCode(code: unknown): code is ConnectorErrorCode {
  return typeof code === 'string' && KNOWN_ERROR_CODES.has(code);
}

/**
 * Base connector layer error.
 */
export class ConnectorLayerError extends Error {
  readonly code: ConnectorErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ConnectorErrorCode = 'UNKNOWN_ERROR',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConnectorLayerError';
    this.code = code;
    this.details = details;
  }

  toJSON(): ConnectorErrorInfo {
    return {
      message: this.message,
      code: this.code,
      stack: this.stack,
      details: this.details,
    };
  }
}

/**
 * Type guard for ConnectorLayerError.
 */
export function isConnectorLayerError(error: unknown): error is ConnectorLayerError {
  return error instanceof ConnectorLayerError;
}

/**
 * Inventory listing or query failed. No partial inventory is returned.
 */
export class DiscoveryFailureError extends ConnectorLayerError {
  readonly stderr?: string;

  constructor(message: string, details?: { stderr?: string; [key: string]: unknown }, options?: { cause?: unknown }) {
    super(message, 'DISCOVERY_FAILED', details, options);
    this.name = 'DiscoveryFailureError';
    this.stderr = details?.stderr;
  }
}

/**
 * The command could not be dispatched (binary missing, spawn refused...).
 * A remote command exiting non-zero is NOT this error: that is a normal
 * `success: false` result.
 */
export class ExecutionFailureError extends ConnectorLayerError {
  readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {
    super(message, 'EXECUTION_FAILED', { command }, options);
    this.name = 'ExecutionFailureError';
    this.command = command;
  }
}

/**
 * File push or pull failed. The message is the captured stderr verbatim.
 */
export class TransferFailureError extends ConnectorLayerError {
  readonly stderr: string;

  constructor(stderr: string, details?: Record<string, unknown>) {
    super(stderr, 'TRANSFER_FAILED', { stderr, ...details });
    this.name = 'TransferFailureError';
    this.stderr = stderr;
  }
}

/**
 * Input rejected before any external call was made.
 */
export class ValidationFailureError extends ConnectorLayerError {
  readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_FAILED', { field, ...details });
    this.name = 'ValidationFailureError';
    this.field = field;
  }
}

/**
 * Connector does not implement the requested operation.
 */
export class UnsupportedOperationError extends ConnectorLayerError {
  constructor(connector: string, operation: string) {
    super(`Connector '${connector}' does not support ${operation}`, 'UNSUPPORTED_OPERATION', {
      connector,
      operation,
    });
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * No connector registered under the requested kind.
 */
export class UnknownConnectorError extends ConnectorLayerError {
  readonly connector: string;

  constructor(connector: string, known: string[]) {
    super(`Unknown connector: @${connector}`, 'UNKNOWN_CONNECTOR', { connector, known });
    this.name = 'UnknownConnectorError';
    this.connector = connector;
  }
}
