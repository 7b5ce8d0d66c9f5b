/**
 * @module @infra-connectors/connector-azure/target
 */

export interface CloudTarget {
  /** Comma-separated resource groups; empty means all */
  groups: string;
  /** Comma-separated VM names; empty means all */
  hosts: string;
}

/**
 * Split a `[<groups>/]<hosts>` pattern on its first `/`.
 *
 * - `dev,prod/`: every host in groups dev and prod
 * - `db,webserver` or `/db,webserver`: hosts db and webserver in any group
 * - `dev,prod/webserver`: host webserver in groups dev and prod
 */
export function parseTarget(pattern?: string): CloudTarget {
  if (!pattern) {
    return { groups: '', hosts: '' };
  }

  const slash = pattern.indexOf('/');
  if (slash === -1) {
    return { groups: '', hosts: pattern };
  }

  return { groups: pattern.slice(0, slash), hosts: pattern.slice(slash + 1) };
}
