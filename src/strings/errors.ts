/**
 * Centralized error messages
 *
 * Organizes error messages by category so the library and the CLI word the
 * same failure the same way.
 */

/**
 * Parameter parsing and merging errors
 */
export const mergeErrors = {
  invalidJson: (err: string) => `Invalid JSON parameters${err ? `: ${err}` : ''}`,
  invalidYaml: (err: string) => `Invalid YAML parameters${err ? `: ${err}` : ''}`,
  nonMappingRoot: (kind: string) =>
    `Parameter document root must be a mapping, found ${kind}`,
  unresolvedAlias: (name: string) => `Unresolved alias *${name}`,
  recursiveAlias: (name: string) => `Alias *${name} refers to a node that contains it`,
  excessiveAliases: (limit: number) => `Aliases expand to more than ${limit} nodes`,
  duplicateKey: (key: string) => `Duplicate key "${key}"`,
  complexKey: 'Mapping keys must be scalars',
  degradedRoot: (sourceIndex: number, scopeName?: string) =>
    `${scopeName ? `${scopeName} (source ${sourceIndex})` : `Source ${sourceIndex}`} is not a mapping; it contributes no parameters`,
} as const;

/**
 * Workspace manifest and scope resolution errors
 */
export const workspaceErrors = {
  manifestNotFound: (startDir: string) =>
    `No paramstack.yaml found in ${startDir} or any parent directory`,
  manifestUnreadable: (manifestPath: string, err: string) =>
    `Cannot read manifest ${manifestPath}: ${err}`,
  invalidManifest: (manifestPath: string, issues: string) =>
    `Invalid manifest ${manifestPath}: ${issues}`,
  nodeNotFound: (fqdn: string) => `Node not found: ${fqdn}`,
  invalidConfiguration: (name: string) =>
    `Invalid configuration name "${name}": path separators and "." / ".." are not allowed`,
  noParameters: (configuration: string, fqdn: string) =>
    `No parameter files for configuration "${configuration}" on node ${fqdn}`,
  parameterFileUnreadable: (filePath: string, err: string) =>
    `Cannot read parameter file ${filePath}: ${err}`,
} as const;

/**
 * Suggestions printed under workspace errors
 */
export const workspaceSuggestions = {
  createManifest: 'Create paramstack.yaml or pass --manifest <path>',
  fixManifest: 'Fix the listed fields in the manifest',
  declareNode: 'Add the node under "nodes" in paramstack.yaml',
  addParameters: (dir: string) => `Add a parameters.yaml under ${dir}`,
  checkPermissions: 'Check the file exists and is readable',
} as const;

/**
 * Command usage errors
 */
export const usageErrors = {
  invalidFormat: (format: string) => `Invalid format "${format}". Use yaml or json.`,
  noFiles: 'No parameter files given',
} as const;

/**
 * Operation failures (file I/O around the merge)
 */
export const operationFailures = {
  readFile: (filePath: string, err: string) => `Failed to read ${filePath}: ${err}`,
  writeOutput: (filePath: string, err: string) => `Failed to write ${filePath}: ${err}`,
  mergeFailed: 'Merge failed',
  resolveFailed: 'Parameter resolution failed',
} as const;

/**
 * Re-export all error categories as a single object for convenience
 */
export const errors = {
  merge: mergeErrors,
  workspace: workspaceErrors,
  suggestions: workspaceSuggestions,
  usage: usageErrors,
  failures: operationFailures,
} as const;
