/**
 * @module @infra-connectors/connector-contracts/quote
 * POSIX shell quoting
 */

import type { CommandSpec } from './command.js';

/**
 * Turns an arbitrary string into one shell word.
 */
export type ShellQuoter = (value: string) => string;

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a value for a POSIX shell.
 *
 * @example
 * quoteShellArg('ls -la')   // "'ls -la'"
 * quoteShellArg("it's")     // "'it'\\''s'"
 * quoteShellArg('/tmp/a')   // "/tmp/a"
 */
export const quoteShellArg: ShellQuoter = (value) => {
  if (value === '') {
    return "''";
  }
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
};

/**
 * Render an argv as a single display line.
 */
export function formatCommandLine(spec: CommandSpec, quote: ShellQuoter = quoteShellArg): string {
  return [spec.command, ...spec.args].map(quote).join(' ');
}
