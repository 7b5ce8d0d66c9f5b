/**
 * @module @infra-connectors/connector-azure/azure-connector
 *
 * Inventory-only connector over Azure Resource Graph. Discovered VMs are
 * handed to the SSH connector as `@ssh/<hostname>`; this connector runs
 * nothing itself.
 *
 * Results are cached per filter combination in a small LRU owned by the
 * connector. The same inventory pass tends to ask for the same filters
 * more than once and every query is slow.
 */

import {
  DiscoveryFailureError,
  UnsupportedOperationError,
  noopLogger,
  noopUI,
  type ConnectorLogger,
  type ConnectorUI,
  type InventoryRecord,
  type InventorySource,
} from '@infra-connectors/connector-contracts';
import { withSpinner } from '@infra-connectors/connector-runtime';
import {
  createResourceGraphClient,
  type ResourceGraphPage,
  type ResourceGraphQueryClient,
} from './client.js';
import { InventoryCache, filtersKey } from './inventory-cache.js';
import { buildQuery, type InventoryFilters } from './query.js';
import { groupRows, inventoryRowsSchema, type GroupedInventory, type InventoryRow } from './rows.js';
import { parseTarget } from './target.js';

export interface CloudInventoryConnectorOptions {
  /** Client factory, called once on the first query */
  createClient?: () => ResourceGraphQueryClient;
  /** Subscriptions for the default client */
  subscriptions?: string[];
  /** Capacity of the default cache (default: 8) */
  cacheSize?: number;
  cache?: InventoryCache<Promise<GroupedInventory>>;
  ui?: ConnectorUI;
  logger?: ConnectorLogger;
}

export class CloudInventoryConnector implements InventorySource {
  readonly name = 'azure';
  readonly handlesExecution = false;

  private client?: ResourceGraphQueryClient;
  private readonly createClient: () => ResourceGraphQueryClient;
  private readonly cache: InventoryCache<Promise<GroupedInventory>>;
  private readonly ui: ConnectorUI;
  private readonly logger: ConnectorLogger;

  constructor(options: CloudInventoryConnectorOptions = {}) {
    this.createClient =
      options.createClient ?? (() => createResourceGraphClient({ subscriptions: options.subscriptions }));
    this.cache = options.cache ?? new InventoryCache(options.cacheSize);
    this.ui = options.ui ?? noopUI;
    this.logger = (options.logger ?? noopLogger).child({ connector: this.name });
  }

  /**
   * Query the inventory, grouped by resource group. Identical filters
   * share one query while cached, including one still in flight.
   */
  async fetch(filters: InventoryFilters): Promise<GroupedInventory> {
    const query = buildQuery(filters);
    const key = filtersKey(filters);

    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug('Inventory cache hit', { filters });
      return cached;
    }

    const pending = this.runQuery(query);
    this.cache.set(key, pending);

    try {
      return await pending;
    } catch (error) {
      if (this.cache.peek(key) === pending) {
        this.cache.delete(key);
      }
      throw error;
    }
  }

  async discover(pattern?: string): Promise<InventoryRecord[]> {
    const { groups, hosts } = parseTarget(pattern);
    const inventory = await this.fetch({ resourceGroup: groups, name: hosts });

    // hostname -> group of the record kept
    const seen = new Map<string, string>();
    const records: InventoryRecord[] = [];

    for (const [group, entries] of inventory) {
      for (const [hostname, attributes] of entries) {
        const keptGroup = seen.get(hostname);
        if (keptGroup !== undefined) {
          // Within one group this is another NIC of the kept VM
          if (keptGroup !== group) {
            this.logger.warn('Duplicate hostname across resource groups, keeping the first', {
              hostname,
              group,
              kept: keptGroup,
            });
          }
          continue;
        }
        seen.set(hostname, group);
        records.push({ identifier: hostname, attributes: { ...attributes }, groups: [group, 'azure'] });
      }
    }

    return records;
  }

  referenceFor(record: InventoryRecord): string {
    return `@ssh/${record.identifier}`;
  }

  session(): never {
    throw new UnsupportedOperationError(this.name, 'sessions');
  }

  private getClient(): ResourceGraphQueryClient {
    if (!this.client) {
      this.client = this.createClient();
    }
    return this.client;
  }

  private runQuery(query: string): Promise<GroupedInventory> {
    return withSpinner(this.ui, 'get Azure inventory', async () => {
      const client = this.getClient();
      const rows: InventoryRow[] = [];
      let skipToken: string | undefined;

      do {
        const page = await this.requestPage(client, query, skipToken);
        rows.push(...parseRows(page.data));
        skipToken = page.skipToken;
      } while (skipToken);

      const inventory = groupRows(rows);
      this.logger.info('Fetched Azure inventory', { groups: inventory.size, rows: rows.length });
      return inventory;
    });
  }

  private async requestPage(
    client: ResourceGraphQueryClient,
    query: string,
    skipToken: string | undefined
  ): Promise<ResourceGraphPage> {
    try {
      return await client.resources({ query, skipToken });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Resource Graph query failed', { error: message });
      throw new DiscoveryFailureError(message, undefined, { cause: error });
    }
  }
}

function parseRows(data: unknown): InventoryRow[] {
  const parsed = inventoryRowsSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new DiscoveryFailureError(`Unexpected Resource Graph response: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}
