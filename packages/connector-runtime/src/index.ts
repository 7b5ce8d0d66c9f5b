/**
 * @module @infra-connectors/connector-runtime
 *
 * Shared runtime pieces for connectors: local process execution, scoped
 * staging files, transfer I/O, terminal UI, logging, configuration and
 * the reference registry.
 */

export { LocalCommandExecutor, type LocalCommandExecutorOptions } from './local-executor.js';
export { withTempFile, type TempFileOptions } from './temp-file.js';
export { resolveLocalFile, readSource, writeDestination } from './transfer-io.js';
export { withSpinner } from './spinner.js';
export { CliUI, type CliUIOptions, type Verbosity } from './cli-ui.js';
export { createConnectorLogger, type ConnectorLoggerOptions, type LoggerLevel } from './logging.js';
export { loadConnectorConfig, type ConnectorConfig } from './config.js';
export {
  ConnectorRegistry,
  parseReference,
  type ParsedReference,
  type ResolvedTarget,
} from './registry.js';
