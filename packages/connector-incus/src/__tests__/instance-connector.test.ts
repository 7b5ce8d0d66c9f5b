/**
 * Discovery tests for InstanceConnector against the in-process hypervisor.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DiscoveryFailureError } from '@infra-connectors/connector-contracts';
import { createConnectorLogger } from '@infra-connectors/connector-runtime';
import { InstanceConnector } from '../instance-connector.js';
import { createIncusConnector, createLxcConnector } from '../index.js';
import { FakeHypervisor, failed } from './fake-hypervisor.js';

const LIST_ARGS = ['list', '--all-projects', '-c', 'nc', '-f', 'json'];

describe('InstanceConnector.discover()', () => {
  let hypervisor: FakeHypervisor;

  beforeEach(() => {
    hypervisor = new FakeHypervisor();
  });

  it('records the first IPv4 address as ssh_hostname', async () => {
    hypervisor.listOutput = '[{"name":"web1","devices":{"eth0":{"ipv4.address":"10.0.0.5"}}}]';
    const connector = new InstanceConnector({ executor: hypervisor });

    const records = await connector.discover();

    expect(records).toEqual([
      {
        identifier: 'web1',
        attributes: { incus_identifier: 'web1', ssh_hostname: '10.0.0.5' },
        groups: ['@incus'],
      },
    ]);
    expect(hypervisor.lastRun()?.spec).toEqual({ command: 'incus', args: LIST_ARGS });
  });

  it('warns when no pattern targets the local server', async () => {
    const lines: string[] = [];
    const logger = createConnectorLogger('test', {}, { sink: (line) => lines.push(line), timestamp: () => 'T0' });
    const connector = new InstanceConnector({ executor: hypervisor, logger });

    await connector.discover();

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      {
        ts: 'T0',
        level: 'warn',
        scope: 'test',
        msg: 'No incus base ID provided! targeting local server',
        connector: 'incus',
      },
    ]);
  });

  it('prefixes identifiers with the remote and scopes the listing', async () => {
    hypervisor.listOutput = JSON.stringify([
      { name: 'web1', devices: {} },
      { name: 'web2' },
    ]);
    const connector = new InstanceConnector({ executor: hypervisor });

    const records = await connector.discover('cluster:');

    expect(hypervisor.lastRun()?.spec.args).toEqual([...LIST_ARGS, 'cluster:']);
    expect(records.map((record) => record.identifier)).toEqual(['cluster:web1', 'cluster:web2']);
    expect(records[1]?.attributes).toEqual({ incus_identifier: 'cluster:web2' });
    expect(records.map((record) => connector.referenceFor(record))).toEqual([
      '@incus/cluster:web1',
      '@incus/cluster:web2',
    ]);
  });

  it('accepts a full reference as the pattern', async () => {
    const connector = new InstanceConnector({ executor: hypervisor });
    await connector.discover('@incus/incus.example.net:web1');
    expect(hypervisor.lastRun()?.spec.args).toEqual([...LIST_ARGS, 'incus.example.net:web1']);
  });

  it('keeps the first of two instances with the same name', async () => {
    hypervisor.listOutput = JSON.stringify([
      { name: 'web1', devices: { eth0: { 'ipv4.address': '10.0.0.5' } } },
      { name: 'web1', devices: { eth0: { 'ipv4.address': '10.9.9.9' } } },
    ]);
    const records = await new InstanceConnector({ executor: hypervisor }).discover('web1');

    expect(records).toHaveLength(1);
    expect(records[0]?.attributes.ssh_hostname).toBe('10.0.0.5');
  });

  it('fails with the CLI stderr when the listing fails', async () => {
    hypervisor.listOutput = failed('Error: The remote "nope" does not exist');
    const connector = new InstanceConnector({ executor: hypervisor });

    await expect(connector.discover('nope:')).rejects.toMatchObject({
      name: 'DiscoveryFailureError',
      code: 'DISCOVERY_FAILED',
      message: 'Error: The remote "nope" does not exist',
      stderr: 'Error: The remote "nope" does not exist',
    });
  });

  it('fails on output that is not JSON', async () => {
    hypervisor.listOutput = 'not json';
    await expect(new InstanceConnector({ executor: hypervisor }).discover('web1')).rejects.toThrow(
      'incus list returned invalid JSON'
    );
  });

  it('fails on JSON of the wrong shape', async () => {
    hypervisor.listOutput = '[{"devices":{}}]';
    const error = await new InstanceConnector({ executor: hypervisor })
      .discover('web1')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DiscoveryFailureError);
    expect(error).toMatchObject({ message: 'Unexpected incus list output: 0.name: Required' });
  });
});

describe('connector variants', () => {
  it('lxc differs only in kind and binary', async () => {
    const hypervisor = new FakeHypervisor();
    hypervisor.listOutput = '[{"name":"c1"}]';
    const connector = createLxcConnector({ executor: hypervisor });

    const records = await connector.discover('local:');

    expect(hypervisor.lastRun()?.spec).toEqual({ command: 'lxc', args: [...LIST_ARGS, 'local:'] });
    expect(records).toEqual([
      { identifier: 'local:c1', attributes: { lxc_identifier: 'local:c1' }, groups: ['@lxc'] },
    ]);
    expect(connector.referenceFor(records[0])).toBe('@lxc/local:c1');
  });

  it('takes the binary path from deps', () => {
    const connector = createIncusConnector({ cli: '/opt/incus/bin/incus' });
    expect(connector.name).toBe('incus');
    expect(connector.cli).toBe('/opt/incus/bin/incus');
    expect(connector.handlesExecution).toBe(true);
  });
});
