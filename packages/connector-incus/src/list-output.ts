/**
 * @module @infra-connectors/connector-incus/list-output
 * Shape of `<cli> list -c nc -f json`
 */

import { z } from 'zod';

const devicePropertiesSchema = z.record(z.string(), z.unknown());

export const instanceRowSchema = z.object({
  name: z.string().min(1),
  devices: z.record(z.string(), devicePropertiesSchema).optional(),
});

export const instanceListSchema = z.array(instanceRowSchema);

export type InstanceRow = z.infer<typeof instanceRowSchema>;
export type InstanceDevices = NonNullable<InstanceRow['devices']>;

/**
 * First non-empty `ipv4.address` among the devices, in listed order.
 */
export function firstIPv4Address(devices: InstanceDevices = {}): string | undefined {
  for (const properties of Object.values(devices)) {
    const address = properties['ipv4.address'];
    if (typeof address === 'string' && address.length > 0) {
      return address;
    }
  }
  return undefined;
}
