/**
 * @module @infra-connectors/connector-factory/factory
 *
 * Wire the connectors from environment configuration. Every connector
 * shares one logger, one UI and one local executor.
 */

import {
  noopUI,
  type CommandExecutor,
  type ConnectorLogger,
  type ConnectorUI,
} from '@infra-connectors/connector-contracts';
import {
  ConnectorRegistry,
  LocalCommandExecutor,
  createConnectorLogger,
  loadConnectorConfig,
  type ConnectorConfig,
} from '@infra-connectors/connector-runtime';
import {
  createIncusConnector,
  createLxcConnector,
  type InstanceConnector,
} from '@infra-connectors/connector-incus';
import {
  CloudInventoryConnector,
  type ResourceGraphQueryClient,
} from '@infra-connectors/connector-azure';

export interface ConnectorFactoryOptions {
  /** Environment to read configuration from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Already loaded configuration; takes precedence over `env` */
  config?: ConnectorConfig;
  ui?: ConnectorUI;
  logger?: ConnectorLogger;
  executor?: CommandExecutor;
  createAzureClient?: () => ResourceGraphQueryClient;
}

export interface ConnectorSet {
  config: ConnectorConfig;
  logger: ConnectorLogger;
  registry: ConnectorRegistry;
  incus: InstanceConnector;
  lxc: InstanceConnector;
  azure: CloudInventoryConnector;
}

/**
 * Create the incus, lxc and azure connectors and register them.
 *
 * @example
 * ```typescript
 * const { registry } = createConnectors({ ui: new CliUI() });
 * const targets = await registry.resolve('@incus/cluster:');
 * ```
 */
export function createConnectors(options: ConnectorFactoryOptions = {}): ConnectorSet {
  const config = options.config ?? loadConnectorConfig(options.env);
  const logger = options.logger ?? createConnectorLogger('infra-connectors', {}, { level: config.logLevel });
  const ui = options.ui ?? noopUI;
  const executor = options.executor ?? new LocalCommandExecutor({ logger });

  const incus = createIncusConnector({ cli: config.incusBin, executor, ui, logger, tempDir: config.tempDir });
  const lxc = createLxcConnector({ cli: config.lxcBin, executor, ui, logger, tempDir: config.tempDir });
  const azure = new CloudInventoryConnector({
    createClient: options.createAzureClient,
    subscriptions: config.azureSubscriptions,
    cacheSize: config.azureCacheSize,
    ui,
    logger,
  });

  const registry = new ConnectorRegistry().register(incus).register(lxc).register(azure);
  logger.debug('Connectors ready', { connectors: registry.names() });

  return { config, logger, registry, incus, lxc, azure };
}
