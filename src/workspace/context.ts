import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as YAML from 'yaml';
import type { ZodError } from 'zod';
import { ManifestSchema, type Manifest } from '../schema/index.js';
import { errors } from '../strings/index.js';

export const MANIFEST_FILENAME = 'paramstack.yaml';

/** Overrides the manifest location */
export const MANIFEST_ENV = 'PARAMSTACK_MANIFEST';

/** Overrides the manifest's data_dir */
export const DATA_DIR_ENV = 'PARAMSTACK_DATA_DIR';

export type WorkspaceErrorCode =
  | 'MANIFEST_NOT_FOUND'
  | 'INVALID_MANIFEST'
  | 'NODE_NOT_FOUND'
  | 'INVALID_NAME'
  | 'FILE_UNREADABLE';

/**
 * Error raised while locating or reading a workspace
 */
export class WorkspaceError extends Error {
  constructor(
    message: string,
    public code: WorkspaceErrorCode,
    public suggestion?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WorkspaceError';
  }
}

/**
 * A loaded workspace: the manifest plus the directories it resolves to
 */
export interface Workspace {
  /** Absolute path of paramstack.yaml */
  manifestPath: string;
  /** Directory containing the manifest */
  rootDir: string;
  /** Absolute data directory (parameters live under <dataDir>/parameters) */
  dataDir: string;
  manifest: Manifest;
}

export interface LoadWorkspaceOptions {
  /** Explicit manifest path (takes priority over the environment) */
  manifestPath?: string;
  /** Where manifest discovery starts (default: process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

async function fileExists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(
    () => true,
    () => false,
  );
}

/**
 * Find paramstack.yaml in startDir or the nearest parent that has one.
 */
export async function findManifest(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  while (true) {
    const filePath = path.join(dir, MANIFEST_FILENAME);
    if (await fileExists(filePath)) {
      return filePath;
    }

    const parentDir = path.dirname(dir);
    if (parentDir === dir) {
      // Reached root
      return null;
    }
    dir = parentDir;
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse and validate manifest text.
 *
 * @throws WorkspaceError INVALID_MANIFEST
 */
export function parseManifest(content: string, manifestPath: string): Manifest {
  const doc = YAML.parseDocument(content);
  const [yamlError] = doc.errors;
  if (yamlError) {
    throw new WorkspaceError(
      errors.workspace.invalidManifest(manifestPath, yamlError.message),
      'INVALID_MANIFEST',
      errors.suggestions.fixManifest,
      { cause: yamlError },
    );
  }

  let raw: unknown;
  try {
    // An empty manifest declares nothing
    raw = doc.toJS() ?? {};
  } catch (err) {
    // Unresolved aliases and alias fan-out surface here
    throw new WorkspaceError(
      errors.workspace.invalidManifest(manifestPath, err instanceof Error ? err.message : String(err)),
      'INVALID_MANIFEST',
      errors.suggestions.fixManifest,
      { cause: err },
    );
  }
  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new WorkspaceError(
      errors.workspace.invalidManifest(manifestPath, formatIssues(result.error)),
      'INVALID_MANIFEST',
      errors.suggestions.fixManifest,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Locate, read and validate the workspace manifest.
 *
 * Manifest lookup order: `options.manifestPath`, PARAMSTACK_MANIFEST, then
 * discovery upwards from `cwd`. The data directory is the manifest's
 * `data_dir` relative to the manifest, unless PARAMSTACK_DATA_DIR is set
 * (relative to `cwd`).
 */
export async function loadWorkspace(options: LoadWorkspaceOptions = {}): Promise<Workspace> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const explicitPath = options.manifestPath ?? env[MANIFEST_ENV];
  const manifestPath = explicitPath ? path.resolve(cwd, explicitPath) : await findManifest(cwd);

  if (!manifestPath) {
    throw new WorkspaceError(
      errors.workspace.manifestNotFound(cwd),
      'MANIFEST_NOT_FOUND',
      errors.suggestions.createManifest,
    );
  }

  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf-8');
  } catch (err) {
    throw new WorkspaceError(
      errors.workspace.manifestUnreadable(manifestPath, err instanceof Error ? err.message : String(err)),
      'MANIFEST_NOT_FOUND',
      errors.suggestions.createManifest,
      { cause: err },
    );
  }

  const manifest = parseManifest(content, manifestPath);
  const rootDir = path.dirname(manifestPath);
  const dataDirOverride = env[DATA_DIR_ENV];
  const dataDir = dataDirOverride
    ? path.resolve(cwd, dataDirOverride)
    : path.resolve(rootDir, manifest.data_dir);

  return { manifestPath, rootDir, dataDir, manifest };
}
