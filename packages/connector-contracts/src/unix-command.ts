/**
 * @module @infra-connectors/connector-contracts/unix-command
 *
 * Compose the command line run by the target's shell from a logical
 * command plus the connector data directives.
 *
 * Layering, innermost first:
 *   env  ->  env K='v' sh -c '<command>'
 *   user ->  sudo -H -n -u '#<uid>' <inner>
 *   cwd  ->  cd '<dir>' && <inner>
 */

import type { ConnectorData } from './connector-data.js';
import { quoteShellArg, type ShellQuoter } from './quote.js';

export type UnixShell = 'ash' | 'bash' | 'dash' | 'posh' | 'sh' | 'zsh';

export interface UnixCommandOptions {
  /** Shell used for the nested `-c` invocations (default: sh) */
  shell?: UnixShell;
  quote?: ShellQuoter;
}

export function makeUnixCommand(
  command: string,
  data: ConnectorData = {},
  options: UnixCommandOptions = {}
): string {
  const shell = options.shell ?? 'sh';
  const quote = options.quote ?? quoteShellArg;
  const envEntries = Object.entries(data.env ?? {});

  let inner = command;

  if (envEntries.length > 0) {
    const assignments = envEntries.map(([key, value]) => `${key}=${quote(value)}`).join(' ');
    inner = `env ${assignments} ${shell} -c ${quote(inner)}`;
  }

  if (data.user !== undefined) {
    const target = envEntries.length > 0 ? inner : `${shell} -c ${quote(inner)}`;
    inner = `sudo -H -n -u ${quote(`#${data.user}`)} ${target}`;
  }

  if (data.cwd) {
    inner = `cd ${quote(data.cwd)} && ${inner}`;
  }

  return inner;
}
