/**
 * @module @infra-connectors/connector-azure/query
 * Resource Graph query for Linux VMs and their primary private IP
 */

import { ValidationFailureError } from '@infra-connectors/connector-contracts';

/**
 * Field name → comma-separated list of accepted values.
 * An empty value leaves the field unrestricted.
 */
export type InventoryFilters = Record<string, string>;

// Field names are spliced into the query unquoted
const FIELD_NAME = /^[A-Za-z]+$/;

const QUERY_HEAD = [
  'Resources',
  "| where type =~ 'microsoft.compute/VirtualMachines'",
  '| where properties.storageProfile.osDisk.osType == "Linux"',
  '| mv-expand netIf = properties.networkProfile.networkInterfaces',
];

// Tags are not projected
const QUERY_TAIL = [
  '| project resourceGroup, name, nicResourceId = tostring(netIf.id), location, zones',
  '| join kind=leftouter (',
  '  Resources',
  "  | where type =~ 'microsoft.network/NetworkInterfaces'",
  '  | mv-expand ipConf = properties.ipConfigurations',
  '  | where tobool(ipConf.properties.primary) == true',
  '  | project nicResourceId = id, privateIP = tostring(ipConf.properties.privateIPAddress)',
  '  ) on nicResourceId',
  '| project group = resourceGroup, hostname = name, ip = privateIP, location, zones',
];

/**
 * Case-insensitive membership clause for one filter, or undefined when
 * the value names nothing.
 *
 * Elements are verbatim literals (`@'...'`): backslashes are plain
 * characters there and a doubled `''` is the only escape.
 *
 * @example
 * whereClause('location', "eastus,o'hare") // "| where location in~ (@'eastus',@'o''hare')"
 */
export function whereClause(field: string, value: string): string | undefined {
  const literals = value
    .split(',')
    .filter((element) => element.length > 0)
    .map((element) => `@'${element.replace(/'/g, "''")}'`);

  return literals.length > 0 ? `| where ${field} in~ (${literals.join(',')})` : undefined;
}

/**
 * Build the inventory query. Every field name is checked before anything
 * is rendered.
 */
export function buildQuery(filters: InventoryFilters): string {
  const entries = Object.entries(filters);

  for (const [field] of entries) {
    if (!FIELD_NAME.test(field)) {
      throw new ValidationFailureError(`Invalid filter field: ${field}`, field);
    }
  }

  const clauses = entries
    .map(([field, value]) => whereClause(field, value))
    .filter((clause): clause is string => clause !== undefined);

  return [...QUERY_HEAD, ...clauses, ...QUERY_TAIL].join('\n');
}
