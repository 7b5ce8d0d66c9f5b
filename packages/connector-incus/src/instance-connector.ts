/**
 * @module @infra-connectors/connector-incus/instance-connector
 *
 * Connector for containers and VMs managed by a local hypervisor CLI
 * (incus, or the lxc front-end of LXD).
 *
 * Discovery lists instances with `<cli> list --all-projects -c nc -f json`
 * and records the first IPv4 address found on an instance's devices as
 * `ssh_hostname`. That address is best-effort: it lets instances without
 * an agent be reached over SSH, nothing more.
 */

import {
  DiscoveryFailureError,
  noopLogger,
  noopUI,
  parseConnectorData,
  quoteShellArg,
  type AttributeValue,
  type CommandExecutor,
  type ConnectorData,
  type ConnectorLogger,
  type ConnectorUI,
  type InventoryRecord,
  type ShellQuoter,
  type TargetConnector,
  type UnixShell,
} from '@infra-connectors/connector-contracts';
import { LocalCommandExecutor, withSpinner } from '@infra-connectors/connector-runtime';
import { firstIPv4Address, instanceListSchema, type InstanceRow } from './list-output.js';
import { InstanceSession } from './instance-session.js';
import { formatInstanceTarget, parseInstanceTarget, remotePrefix } from './target.js';

export interface InstanceConnectorOptions {
  /** Connector kind used in references, groups and attribute keys (default: incus) */
  name?: string;
  /** Binary to invoke (default: `name`) */
  cli?: string;
  /** Shell used inside the instance (default: sh) */
  shell?: UnixShell;
  executor?: CommandExecutor;
  ui?: ConnectorUI;
  logger?: ConnectorLogger;
  /** Parent directory for transfer staging files */
  tempDir?: string;
  quote?: ShellQuoter;
}

export class InstanceConnector implements TargetConnector<InstanceSession> {
  readonly name: string;
  readonly handlesExecution = true;
  readonly cli: string;
  readonly shell: UnixShell;

  private readonly executor: CommandExecutor;
  private readonly ui: ConnectorUI;
  private readonly logger: ConnectorLogger;
  private readonly quote: ShellQuoter;
  private readonly tempDir?: string;

  constructor(options: InstanceConnectorOptions = {}) {
    this.name = options.name ?? 'incus';
    this.cli = options.cli ?? this.name;
    this.shell = options.shell ?? 'sh';
    this.logger = (options.logger ?? noopLogger).child({ connector: this.name });
    this.executor = options.executor ?? new LocalCommandExecutor({ logger: this.logger });
    this.ui = options.ui ?? noopUI;
    this.quote = options.quote ?? quoteShellArg;
    this.tempDir = options.tempDir;
  }

  /**
   * List instances matching `[<remote>:]<instance>`.
   *
   * - no pattern: every instance on the local server
   * - `example`: instance `example` on the local server
   * - `example:`: every instance on remote `example`
   * - `example:foo`: instance `foo` on remote `example`
   */
  async discover(pattern?: string): Promise<InventoryRecord[]> {
    const target = parseInstanceTarget(pattern);
    const scope = formatInstanceTarget(target);
    const args = ['list', '--all-projects', '-c', 'nc', '-f', 'json'];

    if (scope) {
      args.push(scope);
    } else {
      this.logger.warn(`No ${this.name} base ID provided! targeting local server`);
    }

    const rows = await withSpinner(this.ui, `${this.cli} list`, () => this.listInstances(args));
    const prefix = remotePrefix(target);
    const seen = new Set<string>();
    const records: InventoryRecord[] = [];

    for (const row of rows) {
      const identifier = `${prefix}${row.name}`;
      // Same name in two projects
      if (seen.has(identifier)) {
        continue;
      }
      seen.add(identifier);

      const attributes: Record<string, AttributeValue> = {
        [`${this.name}_identifier`]: identifier,
      };
      const address = firstIPv4Address(row.devices);
      if (address !== undefined) {
        attributes.ssh_hostname = address;
      }

      records.push({ identifier, attributes, groups: [`@${this.name}`] });
    }

    this.logger.debug('Discovered instances', { scope, count: records.length });
    return records;
  }

  referenceFor(record: InventoryRecord): string {
    return `@${this.name}/${record.identifier}`;
  }

  /**
   * Bind to one instance. `identifier` may be a discovered identifier or
   * a full `@<kind>/...` reference.
   */
  session(identifier: string, data?: ConnectorData): InstanceSession {
    return new InstanceSession(
      formatInstanceTarget(parseInstanceTarget(identifier)),
      {
        cli: this.cli,
        shell: this.shell,
        executor: this.executor,
        ui: this.ui,
        logger: this.logger,
        quote: this.quote,
        tempDir: this.tempDir,
      },
      parseConnectorData(data)
    );
  }

  private async listInstances(args: string[]): Promise<InstanceRow[]> {
    const result = await this.executor.run({ command: this.cli, args });

    if (!result.success) {
      throw new DiscoveryFailureError(
        result.stderr || `${this.cli} list exited with code ${result.exitCode}`,
        { stderr: result.stderr, exitCode: result.exitCode }
      );
    }

    let output: unknown;
    try {
      output = JSON.parse(result.stdout);
    } catch (error) {
      throw new DiscoveryFailureError(`${this.cli} list returned invalid JSON`, { stdout: result.stdout }, { cause: error });
    }

    const parsed = instanceListSchema.safeParse(output);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new DiscoveryFailureError(`Unexpected ${this.cli} list output: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
  }
}
