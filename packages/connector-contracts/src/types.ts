/**
 * @module @infra-connectors/connector-contracts/types
 *
 * Core type definitions for target connectors.
 *
 * A connector answers two questions for the automation engine:
 * - which targets exist (`InventorySource.discover`)
 * - how to run commands and move files on one of them (`TargetSession`)
 *
 * Discovery output is the only thing the registry sees; it pairs every
 * InventoryRecord with the connector's target reference string.
 */

import type { Readable, Writable } from 'node:stream';
import type { CommandResult } from './command.js';
import type { ConnectorData } from './connector-data.js';

// ============================================================================
// Inventory
// ============================================================================

/**
 * Attribute value. Never an empty string or an empty list: absent keys
 * mean "unknown".
 */
export type AttributeValue = string | string[];

/**
 * A discovered target plus its metadata and group tags.
 */
export interface InventoryRecord {
  /**
   * Connector-namespaced key, unique within one discovery call.
   *
   * @example "web1", "cluster:web1", "vm-prod-01"
   */
  identifier: string;

  /** Free-form metadata; keys are fixed per connector */
  attributes: Record<string, AttributeValue>;

  /** Group tags in insertion order */
  groups: string[];
}

/**
 * Anything that can enumerate targets.
 */
export interface InventorySource {
  /** Connector kind, used as the `@<kind>/` prefix of target references */
  readonly name: string;

  /** Whether sessions can execute commands on discovered targets */
  readonly handlesExecution: boolean;

  /**
   * Enumerate targets matching a connector-specific pattern.
   * An absent or empty pattern means "everything this connector sees".
   */
  discover(pattern?: string): Promise<InventoryRecord[]>;

  /**
   * Target reference string the registry binds the record under.
   *
   * @example "@incus/cluster:web1", "@ssh/vm-prod-01"
   */
  referenceFor(record: InventoryRecord): string;
}

// ============================================================================
// Sessions
// ============================================================================

/**
 * Local side of an upload: a path on the controlling machine, raw bytes,
 * or an open stream (text chunks are encoded as UTF-8).
 */
export type TransferSource = string | Uint8Array | Readable;

/**
 * Local side of a download: a path or an open writable stream.
 * Streams are written to but not ended.
 */
export type TransferDestination = string | Writable;

/**
 * Print flags shared by execute and transfer calls.
 */
export interface PrintOptions {
  /** Echo the process output to the controlling terminal */
  printOutput?: boolean;

  /** Echo the command line before running it */
  printInput?: boolean;
}

/**
 * Options for TargetSession.execute().
 */
export interface ExecuteOptions extends PrintOptions {
  /** Request a pseudo-terminal */
  getPty?: boolean;

  /** Per-call override of the session's connector data, field by field */
  data?: ConnectorData;

  /** Kill the local process after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Options for TargetSession.upload()/download().
 */
export interface TransferOptions extends PrintOptions {
  /**
   * Remote staging path for connectors that stage on the target.
   * Connectors that stage locally ignore it.
   */
  stagingPath?: string;
}

/**
 * A connector bound to one discovered target.
 */
export interface TargetSession {
  /** The bound target identifier */
  readonly identifier: string;

  /**
   * Run a shell command on the target.
   * A non-zero exit is reported as `success: false`, not thrown.
   */
  execute(command: string, options?: ExecuteOptions): Promise<CommandResult>;

  /** Copy a local file, bytes or stream to `destination` on the target */
  upload(source: TransferSource, destination: string, options?: TransferOptions): Promise<boolean>;

  /** Copy `source` on the target into a local file or stream */
  download(source: string, destination: TransferDestination, options?: TransferOptions): Promise<boolean>;
}

/**
 * Connector that can both discover targets and open sessions on them.
 */
export interface TargetConnector<TSession extends TargetSession = TargetSession> extends InventorySource {
  session(identifier: string, data?: ConnectorData): TSession;
}
