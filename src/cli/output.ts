import chalk from 'chalk';
import Table from 'cli-table3';
import { formatYamlFloat } from '../merge/codec.js';
import { FormatError } from '../merge/errors.js';
import type { ProvenanceLedger, ScopeValue } from '../merge/types.js';
import type { StructuredValue } from '../merge/value.js';
import type { ResolvedSource } from '../workspace/resolve.js';
import { WorkspaceError } from '../workspace/context.js';
import { exitCodeFor } from './exit-codes.js';

/** Enables debug output without --debug */
export const DEBUG_ENV = 'PARAMSTACK_DEBUG';

/**
 * Global output format (set by --json flag)
 */
let globalJsonMode = false;

/**
 * Global debug output (set by --debug flag)
 */
let globalDebugMode = false;

export function setJsonMode(enabled: boolean): void {
  globalJsonMode = enabled;
}

export function isJsonMode(): boolean {
  return globalJsonMode;
}

export function setDebugMode(enabled: boolean): void {
  globalDebugMode = enabled;
}

export function isDebugMode(): boolean {
  return globalDebugMode || process.env[DEBUG_ENV] === '1';
}

/**
 * Output data - JSON if --json flag, otherwise formatted
 */
export function output(data: unknown, formatter?: () => void): void {
  if (globalJsonMode) {
    console.log(JSON.stringify(data, null, 2));
  } else if (formatter) {
    formatter();
  } else {
    console.log(data);
  }
}

/**
 * Output success message
 */
export function success(message: string, data?: Record<string, unknown>): void {
  if (globalJsonMode) {
    console.log(JSON.stringify({ success: true, message, ...data }));
  } else {
    console.log(chalk.green('OK'), message);
  }
}

/**
 * Output error message
 */
export function error(message: string, details?: unknown): void {
  if (globalJsonMode) {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗'), message);
    if (details) {
      console.error(chalk.gray(String(details)));
    }
  }
}

/**
 * Output warning message (suppressed in JSON mode)
 */
export function warn(message: string): void {
  if (!globalJsonMode) {
    console.warn(chalk.yellow('⚠'), message);
  }
}

/**
 * Output info message (suppressed in JSON mode)
 */
export function info(message: string): void {
  if (!globalJsonMode) {
    console.log(chalk.blue('ℹ'), message);
  }
}

/**
 * Debug line on stderr, only with --debug or PARAMSTACK_DEBUG=1
 */
export function debug(message: string): void {
  if (isDebugMode()) {
    console.error(chalk.gray(`[DEBUG] ${message}`));
  }
}

/**
 * Report a command failure and set the exit code for it.
 *
 * Known errors print their own message (and suggestion); anything else is
 * reported under `fallback` with the underlying message as details.
 */
export function failCommand(fallback: string, err: unknown): void {
  if (err instanceof WorkspaceError) {
    error(err.message, err.suggestion);
  } else if (err instanceof FormatError) {
    error(err.message);
  } else {
    error(fallback, err instanceof Error ? err.message : err);
  }
  process.exitCode = exitCodeFor(err);
}

/**
 * Single-line rendering of a value for tables
 */
export function formatValue(value: StructuredValue): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return String(value.value);
    case 'int':
      return value.value.toString();
    case 'float':
      return formatYamlFloat(value.value);
    case 'string':
      return value.value;
    case 'sequence':
      return `[${value.items.map(formatValue).join(', ')}]`;
    case 'mapping':
      return `{${Array.from(value.entries, ([key, entry]) => `${key}: ${formatValue(entry)}`).join(', ')}}`;
  }
}

function formatOverridden(overridden: ScopeValue[] | undefined): string {
  if (!overridden) {
    return chalk.gray('-');
  }
  return overridden.map((entry) => `${entry.scopeName}=${formatValue(entry.value)}`).join(', ');
}

/**
 * Provenance ledger as a table, one row per overriding leaf
 */
export function formatProvenanceTable(provenance: ProvenanceLedger): string {
  if (provenance.size === 0) {
    return chalk.gray('No overriding values');
  }

  const table = new Table({
    head: [
      chalk.bold('Path'),
      chalk.bold('Scope'),
      chalk.bold('Precedence'),
      chalk.bold('Value'),
      chalk.bold('Overrode'),
    ],
    style: {
      head: [],
      border: [],
    },
  });

  for (const [path, record] of provenance) {
    table.push([
      path,
      record.scopeName,
      String(record.precedence),
      formatValue(record.value),
      formatOverridden(record.overriddenValues),
    ]);
  }

  return table.toString();
}

/**
 * Resolved sources as a table, lowest precedence first
 */
export function formatSourcesTable(sources: ResolvedSource[]): string {
  const table = new Table({
    head: [chalk.bold('Scope'), chalk.bold('Precedence'), chalk.bold('File'), chalk.bold('Checksum')],
    style: {
      head: [],
      border: [],
    },
  });

  for (const source of sources) {
    table.push([source.scopeName, String(source.precedence), source.path, source.checksum.slice(0, 12)]);
  }

  return table.toString();
}
