/**
 * @module @infra-connectors/connector-incus
 *
 * Instance connector for incus and LXD. The two variants are the same
 * connector with a different kind and binary.
 */

import { InstanceConnector, type InstanceConnectorOptions } from './instance-connector.js';

export { InstanceConnector, type InstanceConnectorOptions } from './instance-connector.js';
export { InstanceSession, type InstanceSessionContext } from './instance-session.js';
export {
  parseInstanceTarget,
  formatInstanceTarget,
  remotePrefix,
  type InstanceTarget,
} from './target.js';
export {
  instanceListSchema,
  instanceRowSchema,
  firstIPv4Address,
  type InstanceRow,
  type InstanceDevices,
} from './list-output.js';

export type InstanceConnectorDeps = Omit<InstanceConnectorOptions, 'name'>;

export function createIncusConnector(deps: InstanceConnectorDeps = {}): InstanceConnector {
  return new InstanceConnector({ ...deps, name: 'incus', cli: deps.cli ?? 'incus' });
}

export function createLxcConnector(deps: InstanceConnectorDeps = {}): InstanceConnector {
  return new InstanceConnector({ ...deps, name: 'lxc', cli: deps.cli ?? 'lxc' });
}
