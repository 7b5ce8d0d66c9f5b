/**
 * @module @infra-connectors/connector-runtime/registry
 * Connector registry for target reference resolution
 */

import {
  UnknownConnectorError,
  ValidationFailureError,
  type InventoryRecord,
  type InventorySource,
} from '@infra-connectors/connector-contracts';

/**
 * Parsed `@<kind>[/<pattern>]` reference.
 */
export interface ParsedReference {
  kind: string;
  /** Connector-specific pattern; undefined when the reference has none */
  pattern?: string;
}

/**
 * A discovered record paired with its target reference string.
 */
export interface ResolvedTarget {
  reference: string;
  record: InventoryRecord;
  source: InventorySource;
}

/**
 * Split a reference on its first '/'.
 *
 * @example
 * parseReference('@incus/cluster:web1') // { kind: 'incus', pattern: 'cluster:web1' }
 * parseReference('@azure')              // { kind: 'azure' }
 */
export function parseReference(reference: string): ParsedReference {
  if (!reference.startsWith('@') || reference.length === 1) {
    throw new ValidationFailureError(`Target reference must start with @<connector>: ${reference}`, 'reference');
  }

  const body = reference.slice(1);
  const slash = body.indexOf('/');
  if (slash === -1) {
    return { kind: body };
  }

  const pattern = body.slice(slash + 1);
  return { kind: body.slice(0, slash), pattern: pattern.length > 0 ? pattern : undefined };
}

export class ConnectorRegistry {
  private readonly sources = new Map<string, InventorySource>();

  register(source: InventorySource): this {
    if (this.sources.has(source.name)) {
      throw new ValidationFailureError(`Connector already registered: @${source.name}`, 'name');
    }
    this.sources.set(source.name, source);
    return this;
  }

  get(name: string): InventorySource | undefined {
    return this.sources.get(name);
  }

  names(): string[] {
    return [...this.sources.keys()];
  }

  /**
   * Discover every target a reference matches.
   */
  async resolve(reference: string): Promise<ResolvedTarget[]> {
    const { kind, pattern } = parseReference(reference);
    const source = this.sources.get(kind);
    if (!source) {
      throw new UnknownConnectorError(kind, this.names());
    }

    const records = await source.discover(pattern);
    return records.map((record) => ({
      reference: source.referenceFor(record),
      record,
      source,
    }));
  }
}
