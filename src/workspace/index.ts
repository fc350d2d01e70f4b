/**
 * Filesystem workspace: manifest loading and per-node scope resolution.
 */

export {
  DATA_DIR_ENV,
  MANIFEST_ENV,
  MANIFEST_FILENAME,
  WorkspaceError,
  findManifest,
  loadWorkspace,
  parseManifest,
} from './context.js';
export type { LoadWorkspaceOptions, Workspace, WorkspaceErrorCode } from './context.js';

export {
  DEFAULT_SCOPE_TYPE,
  NODE_SCOPE_TYPE,
  PARAMETERS_FILENAME,
  checksum,
  findNode,
  formatScopeName,
  mergeNodeParameters,
  parameterFilePath,
  resolveParameterSources,
} from './resolve.js';
export type {
  NodeMergeOptions,
  NodeMergeResult,
  ResolveOptions,
  ResolvedSource,
} from './resolve.js';
