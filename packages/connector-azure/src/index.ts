/**
 * @module @infra-connectors/connector-azure
 *
 * Azure Resource Graph inventory connector.
 */

export {
  CloudInventoryConnector,
  type CloudInventoryConnectorOptions,
} from './azure-connector.js';
export {
  createResourceGraphClient,
  type ResourceGraphClientOptions,
  type ResourceGraphPage,
  type ResourceGraphQueryClient,
  type ResourceGraphRequest,
} from './client.js';
export { InventoryCache, filtersKey } from './inventory-cache.js';
export { buildQuery, whereClause, type InventoryFilters } from './query.js';
export {
  groupRows,
  inventoryRowSchema,
  inventoryRowsSchema,
  toHostAttributes,
  type GroupedInventory,
  type HostAttributes,
  type HostEntry,
  type InventoryRow,
} from './rows.js';
export { parseTarget, type CloudTarget } from './target.js';
