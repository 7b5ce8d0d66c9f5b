/**
 * @module @infra-connectors/connector-incus/target
 * `[<remote>:]<instance>` target patterns
 */

export interface InstanceTarget {
  /** Remote name; undefined when the pattern has no `:` */
  remote?: string;
  /** Instance name; empty means every instance on the remote */
  instance: string;
}

/**
 * Parse a target pattern, splitting on the first `:` only.
 * A leading `@<kind>/` reference prefix is dropped.
 *
 * @example
 * parseInstanceTarget()                     // { instance: '' }
 * parseInstanceTarget('web1')               // { instance: 'web1' }
 * parseInstanceTarget('cluster:')           // { remote: 'cluster', instance: '' }
 * parseInstanceTarget('@incus/cluster:web1') // { remote: 'cluster', instance: 'web1' }
 */
export function parseInstanceTarget(pattern?: string): InstanceTarget {
  if (!pattern) {
    return { instance: '' };
  }

  const slash = pattern.indexOf('/');
  const body = slash === -1 ? pattern : pattern.slice(slash + 1);
  const colon = body.indexOf(':');
  if (colon === -1) {
    return { instance: body };
  }

  return { remote: body.slice(0, colon), instance: body.slice(colon + 1) };
}

export function formatInstanceTarget(target: InstanceTarget): string {
  return target.remote === undefined ? target.instance : `${target.remote}:${target.instance}`;
}

/**
 * Identifier prefix for instances listed from `target`'s remote.
 */
export function remotePrefix(target: InstanceTarget): string {
  return target.remote ? `${target.remote}:` : '';
}
