/**
 * @module @infra-connectors/connector-contracts
 *
 * Shared contracts for target connectors. No runtime dependencies beyond
 * zod (connector data schema).
 */

// Types
export type {
  AttributeValue,
  InventoryRecord,
  InventorySource,
  TransferSource,
  TransferDestination,
  PrintOptions,
  ExecuteOptions,
  TransferOptions,
  TargetSession,
  TargetConnector,
} from './types.js';

// Commands
export type { CommandSpec, CommandResult, RunOptions, CommandExecutor } from './command.js';
export { quoteShellArg, formatCommandLine, type ShellQuoter } from './quote.js';
export { makeUnixCommand, type UnixShell, type UnixCommandOptions } from './unix-command.js';

// Connector data
export {
  connectorDataSchema,
  parseConnectorData,
  mergeConnectorData,
  type ConnectorData,
} from './connector-data.js';

// Errors
export {
  ConnectorLayerError,
  DiscoveryFailureError,
  ExecutionFailureError,
  TransferFailureError,
  ValidationFailureError,
  UnsupportedOperationError,
  UnknownConnectorError,
  isConnectorLayerError,
  isKnownErrorCode,
  type ConnectorErrorCode,
  type ConnectorErrorInfo,
} from './errors.js';

// UI & logging
export { noopUI, type ConnectorUI, type Spinner } from './ui.js';
export { noopLogger, type ConnectorLogger, type LogFields, type LogLevel } from './logger.js';
