/**
 * Scope resolution: which parameter files apply to a node, in which order.
 *
 * Files live at
 *   <dataDir>/parameters/<configuration>/<ScopeType>/parameters.yaml          (Default)
 *   <dataDir>/parameters/<configuration>/<ScopeType>/<value>/parameters.yaml  (tagged scopes)
 *   <dataDir>/parameters/<configuration>/Node/<fqdn>/parameters.yaml          (the node itself)
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ParameterMerger } from '../merge/merger.js';
import type {
  IParameterMerger,
  MergeOptions,
  ParameterSource,
  ProvenanceLedger,
} from '../merge/types.js';
import {
  DEFAULT_SCOPE_TYPE,
  NODE_SCOPE_TYPE,
  pathSegmentPattern,
  type ManagedNode,
  type ScopeType,
} from '../schema/index.js';
import { errors } from '../strings/index.js';
import { WorkspaceError, type Workspace } from './context.js';

export { DEFAULT_SCOPE_TYPE, NODE_SCOPE_TYPE };

export const PARAMETERS_FILENAME = 'parameters.yaml';

/**
 * A parameter file that applies to a node
 */
export interface ResolvedSource extends ParameterSource {
  scopeType: string;
  /** Tag value or fqdn; absent for the Default scope */
  scopeValue?: string;
  /** Absolute path of the parameter file */
  path: string;
  /** Lower-case hex SHA-256 of the content */
  checksum: string;
}

export interface ResolveOptions {
  /** Receives one line per scope considered */
  onDebug?: (message: string) => void;
}

export interface NodeMergeOptions extends MergeOptions, ResolveOptions {
  /** Track which scope supplied each leaf */
  provenance?: boolean;
}

export interface NodeMergeResult {
  sources: ResolvedSource[];
  mergedContent: string;
  /** Present when provenance was requested */
  provenance?: ProvenanceLedger;
}

interface ScopeCandidate {
  scopeType: ScopeType;
  scopeValue?: string;
}

/**
 * Path of the parameter file for a scope.
 */
export function parameterFilePath(
  workspace: Workspace,
  configuration: string,
  scopeType: string,
  scopeValue?: string,
): string {
  const segments = scopeValue === undefined ? [scopeType] : [scopeType, scopeValue];
  return path.join(workspace.dataDir, 'parameters', configuration, ...segments, PARAMETERS_FILENAME);
}

/**
 * Scope name shown in provenance: "Default", "Environment/Production", ...
 */
export function formatScopeName(scopeType: string, scopeValue?: string): string {
  return scopeValue === undefined ? scopeType : `${scopeType}/${scopeValue}`;
}

export function checksum(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

export function findNode(workspace: Workspace, fqdn: string): ManagedNode {
  const node = workspace.manifest.nodes.find((candidate) => candidate.fqdn === fqdn);
  if (!node) {
    throw new WorkspaceError(
      errors.workspace.nodeNotFound(fqdn),
      'NODE_NOT_FOUND',
      errors.suggestions.declareNode,
    );
  }
  return node;
}

/**
 * Scopes that apply to a node, lowest precedence first:
 * Default (unless the node is tagged with it), the node's tags by precedence,
 * then Node. The manifest schema keeps Default below and Node above every
 * other scope type.
 */
function scopeCandidates(workspace: Workspace, node: ManagedNode): ScopeCandidate[] {
  const scopeTypes = new Map(workspace.manifest.scope_types.map((st) => [st.name, st]));
  const candidates: ScopeCandidate[] = [];

  const defaultScope = scopeTypes.get(DEFAULT_SCOPE_TYPE);
  if (defaultScope && !(DEFAULT_SCOPE_TYPE in node.tags)) {
    candidates.push({ scopeType: defaultScope });
  }

  const tagged: ScopeCandidate[] = [];
  for (const [typeName, scopeValue] of Object.entries(node.tags)) {
    const scopeType = scopeTypes.get(typeName);
    // The manifest schema rejects tags of undeclared scope types
    if (scopeType) {
      tagged.push({ scopeType, scopeValue });
    }
  }
  // Stable: tags of equal precedence keep manifest order
  tagged.sort((a, b) => a.scopeType.precedence - b.scopeType.precedence);
  candidates.push(...tagged);

  const nodeScope = scopeTypes.get(NODE_SCOPE_TYPE);
  if (nodeScope) {
    candidates.push({ scopeType: nodeScope, scopeValue: node.fqdn });
  }

  return candidates;
}

async function readIfPresent(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw new WorkspaceError(
      errors.workspace.parameterFileUnreadable(filePath, err instanceof Error ? err.message : String(err)),
      'FILE_UNREADABLE',
      errors.suggestions.checkPermissions,
      { cause: err },
    );
  }
}

/**
 * Resolve the parameter files that apply to a node for one configuration.
 *
 * Scopes without a parameter file are skipped.
 *
 * @returns Sources in ascending precedence (possibly empty)
 * @throws WorkspaceError NODE_NOT_FOUND, INVALID_NAME or FILE_UNREADABLE
 */
export async function resolveParameterSources(
  workspace: Workspace,
  configuration: string,
  fqdn: string,
  options: ResolveOptions = {},
): Promise<ResolvedSource[]> {
  if (!pathSegmentPattern.test(configuration)) {
    throw new WorkspaceError(errors.workspace.invalidConfiguration(configuration), 'INVALID_NAME');
  }

  const node = findNode(workspace, fqdn);
  const sources: ResolvedSource[] = [];

  for (const { scopeType, scopeValue } of scopeCandidates(workspace, node)) {
    const filePath = parameterFilePath(workspace, configuration, scopeType.name, scopeValue);
    const content = await readIfPresent(filePath);
    const scopeName = formatScopeName(scopeType.name, scopeValue);

    if (content === null) {
      options.onDebug?.(`${scopeName}: no parameter file at ${filePath}`);
      continue;
    }

    options.onDebug?.(`${scopeName} (precedence ${scopeType.precedence}): ${filePath}`);
    sources.push({
      scopeName,
      scopeType: scopeType.name,
      scopeValue,
      precedence: scopeType.precedence,
      content,
      path: filePath,
      checksum: checksum(content),
    });
  }

  return sources;
}

/**
 * Merge the parameters of a node for one configuration.
 *
 * @returns null when no scope has a parameter file
 * @throws WorkspaceError, FormatError
 */
export async function mergeNodeParameters(
  workspace: Workspace,
  configuration: string,
  fqdn: string,
  options: NodeMergeOptions = {},
  merger: IParameterMerger = new ParameterMerger(),
): Promise<NodeMergeResult | null> {
  const sources = await resolveParameterSources(workspace, configuration, fqdn, options);
  if (sources.length === 0) {
    return null;
  }

  if (options.provenance) {
    const result = merger.mergeWithProvenance(sources, options);
    return { sources, mergedContent: result.mergedContent, provenance: result.provenance };
  }

  return {
    sources,
    mergedContent: merger.merge(
      sources.map((source) => source.content),
      options,
    ),
  };
}
