/**
 * Shared CLI test utilities
 *
 * Runs the paramstack program in-process and captures what it prints.
 * Output is collected from console.log/warn/error with colors stripped.
 */
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { format, stripVTControlCharacters } from 'node:util';
import { vi } from 'vitest';
import { setDebugMode, setJsonMode } from '../../src/cli/output.js';
import { createProgram } from '../../src/cli/program.js';

/**
 * Result from running a paramstack command
 */
export interface CliResult {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Everything written through console.log, one entry per call */
  stdout: string;
  /** Everything written through console.warn and console.error */
  stderr: string;
}

/**
 * Run paramstack with the given arguments (without the program name).
 */
export async function runCli(args: string[]): Promise<CliResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const capture =
    (into: string[]) =>
    (...parts: unknown[]): void => {
      into.push(stripVTControlCharacters(format(...parts)));
    };

  const log = vi.spyOn(console, 'log').mockImplementation(capture(stdout));
  const warn = vi.spyOn(console, 'warn').mockImplementation(capture(stderr));
  const error = vi.spyOn(console, 'error').mockImplementation(capture(stderr));
  process.exitCode = undefined;

  try {
    await createProgram().parseAsync(['node', 'paramstack', ...args]);
    return {
      exitCode: typeof process.exitCode === 'number' ? process.exitCode : 0,
      stdout: stdout.join('\n'),
      stderr: stderr.join('\n'),
    };
  } finally {
    process.exitCode = undefined;
    setJsonMode(false);
    setDebugMode(false);
    log.mockRestore();
    warn.mockRestore();
    error.mockRestore();
  }
}

/**
 * Create a temporary directory for test isolation
 */
export async function createTempDir(prefix = 'paramstack-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Clean up a temporary directory
 */
export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write files below `root`, creating directories as needed.
 *
 * @param files Map of relative path to content
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }
}

/**
 * Manifest used by workspace tests: four scope types and two nodes.
 *
 * web01.test is tagged Region=eu and Environment=Production; db01.test is
 * tagged with its own Default value.
 */
export const TEST_MANIFEST = `data_dir: data
scope_types:
  - name: Default
    precedence: 0
  - name: Region
    precedence: 10
  - name: Environment
    precedence: 20
  - name: Node
    precedence: 100
nodes:
  - fqdn: web01.test
    tags:
      Environment: Production
      Region: eu
  - fqdn: db01.test
    tags:
      Default: storage
`;

/**
 * Workspace with parameter files for the "app" configuration.
 */
export async function setupTestWorkspace(): Promise<string> {
  const root = await createTempDir();
  await writeFiles(root, {
    'paramstack.yaml': TEST_MANIFEST,
    'data/parameters/app/Default/parameters.yaml': 'server:\n  host: localhost\n  port: 8080\nlog_level: info\n',
    'data/parameters/app/Region/eu/parameters.yaml': 'server:\n  host: eu.example.test\n',
    'data/parameters/app/Environment/Production/parameters.yaml': 'log_level: warn\n',
    'data/parameters/app/Node/web01.test/parameters.yaml': 'log_level: debug\n',
    'data/parameters/app/Default/storage/parameters.yaml': 'disk: ssd\n',
  });
  return root;
}
