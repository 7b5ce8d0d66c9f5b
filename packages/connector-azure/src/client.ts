/**
 * @module @infra-connectors/connector-azure/client
 *
 * The slice of the Resource Graph API the connector uses. The default
 * implementation wraps `@azure/arm-resourcegraph` authenticated through
 * `DefaultAzureCredential` (environment, managed identity, az CLI...).
 */

import { ResourceGraphClient } from '@azure/arm-resourcegraph';
import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';

export interface ResourceGraphRequest {
  query: string;
  /** Continuation token from the previous page */
  skipToken?: string;
}

export interface ResourceGraphPage {
  /** Rows in `objectArray` format */
  data: unknown;
  /** Set when more rows are available */
  skipToken?: string;
}

export interface ResourceGraphQueryClient {
  resources(request: ResourceGraphRequest): Promise<ResourceGraphPage>;
}

export interface ResourceGraphClientOptions {
  credential?: TokenCredential;
  /** Subscriptions to query; empty or absent means every accessible one */
  subscriptions?: string[];
}

export function createResourceGraphClient(options: ResourceGraphClientOptions = {}): ResourceGraphQueryClient {
  const client = new ResourceGraphClient(options.credential ?? new DefaultAzureCredential());
  const subscriptions = options.subscriptions && options.subscriptions.length > 0 ? options.subscriptions : undefined;

  return {
    async resources(request) {
      const response = await client.resources({
        query: request.query,
        subscriptions,
        options: { resultFormat: 'objectArray', skipToken: request.skipToken },
      });
      return { data: response.data, skipToken: response.skipToken };
    },
  };
}
