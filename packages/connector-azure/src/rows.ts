/**
 * @module @infra-connectors/connector-azure/rows
 * Projected query rows and their inventory attributes
 */

import { z } from 'zod';
import type { AttributeValue } from '@infra-connectors/connector-contracts';

export const inventoryRowSchema = z.object({
  group: z.string().min(1),
  hostname: z.string().min(1),
  ip: z.string().nullish(),
  location: z.string().nullish(),
  zones: z.array(z.string()).nullish(),
});

export const inventoryRowsSchema = z.array(inventoryRowSchema);

export type InventoryRow = z.infer<typeof inventoryRowSchema>;

export type HostAttributes = Record<string, AttributeValue>;

/** `[hostname, attributes]` in API return order */
export type HostEntry = [hostname: string, attributes: HostAttributes];

/** Resource group → hosts */
export type GroupedInventory = Map<string, HostEntry[]>;

/**
 * `{ ssh_hostname, location, zones, group }`, leaving out empty values.
 * A VM without a primary NIC comes back with an empty `ip`.
 */
export function toHostAttributes(row: InventoryRow): HostAttributes {
  const attributes: HostAttributes = {};

  if (row.ip) {
    attributes.ssh_hostname = row.ip;
  }
  if (row.location) {
    attributes.location = row.location;
  }
  if (row.zones && row.zones.length > 0) {
    attributes.zones = row.zones;
  }
  attributes.group = row.group;

  return attributes;
}

export function groupRows(rows: InventoryRow[]): GroupedInventory {
  const inventory: GroupedInventory = new Map();

  for (const row of rows) {
    let hosts = inventory.get(row.group);
    if (!hosts) {
      hosts = [];
      inventory.set(row.group, hosts);
    }
    hosts.push([row.hostname, toHostAttributes(row)]);
  }

  return inventory;
}
