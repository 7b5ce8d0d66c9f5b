/**
 * @module @infra-connectors/connector-factory
 *
 * Entry point for hosts: builds every connector from configuration.
 */

export { createConnectors, type ConnectorFactoryOptions, type ConnectorSet } from './factory.js';
