import { z } from 'zod';

/**
 * Names that become a single directory level under the data directory:
 * no path separators, not "." or ".."
 */
export const pathSegmentPattern = /^(?!\.{1,2}$)[^/\\]+$/;

export const PathSegmentSchema = z
  .string()
  .min(1, 'Name is required')
  .regex(pathSegmentPattern, 'Name cannot contain path separators or be "." / ".."');

/** Scope applied to every node that has no tag of its type */
export const DEFAULT_SCOPE_TYPE = 'Default';

/** Scope keyed by the node's own fqdn */
export const NODE_SCOPE_TYPE = 'Node';

/**
 * Scope type - a tier of parameters (Default, Region, Environment, Node, ...)
 */
export const ScopeTypeSchema = z.object({
  name: PathSegmentSchema,
  precedence: z.number().int('Precedence must be an integer'),
  description: z.string().optional(),
});

/**
 * Managed node - tags map scope type names to scope values
 */
export const NodeSchema = z.object({
  fqdn: PathSegmentSchema,
  tags: z.record(PathSegmentSchema).default({}),
});

/**
 * Workspace manifest (paramstack.yaml)
 */
export const ManifestSchema = z
  .object({
    data_dir: z.string().min(1).default('data'),
    scope_types: z.array(ScopeTypeSchema).default([]),
    nodes: z.array(NodeSchema).default([]),
  })
  .superRefine((manifest, ctx) => {
    const scopeNames = new Set<string>();
    manifest.scope_types.forEach((scopeType, idx) => {
      if (scopeNames.has(scopeType.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scope_types', idx, 'name'],
          message: `Duplicate scope type "${scopeType.name}"`,
        });
      }
      scopeNames.add(scopeType.name);
    });

    const defaultScope = manifest.scope_types.find((st) => st.name === DEFAULT_SCOPE_TYPE);
    const nodeScope = manifest.scope_types.find((st) => st.name === NODE_SCOPE_TYPE);
    manifest.scope_types.forEach((scopeType, idx) => {
      if (defaultScope && scopeType !== defaultScope && scopeType.precedence <= defaultScope.precedence) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scope_types', idx, 'precedence'],
          message: `Scope type "${scopeType.name}" must have a higher precedence than ${DEFAULT_SCOPE_TYPE}`,
        });
      }
      if (nodeScope && scopeType !== nodeScope && scopeType.precedence >= nodeScope.precedence) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scope_types', idx, 'precedence'],
          message: `Scope type "${scopeType.name}" must have a lower precedence than ${NODE_SCOPE_TYPE}`,
        });
      }
    });

    const fqdns = new Set<string>();
    manifest.nodes.forEach((node, idx) => {
      if (fqdns.has(node.fqdn)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes', idx, 'fqdn'],
          message: `Duplicate node "${node.fqdn}"`,
        });
      }
      fqdns.add(node.fqdn);

      for (const scopeType of Object.keys(node.tags)) {
        if (scopeType === NODE_SCOPE_TYPE) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['nodes', idx, 'tags', scopeType],
            message: `${NODE_SCOPE_TYPE} scope is the node's fqdn and cannot be tagged`,
          });
        } else if (!scopeNames.has(scopeType)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['nodes', idx, 'tags', scopeType],
            message: `Unknown scope type "${scopeType}"`,
          });
        }
      }
    });
  });

export type ScopeType = z.infer<typeof ScopeTypeSchema>;
export type ManagedNode = z.infer<typeof NodeSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
export type ManifestInput = z.input<typeof ManifestSchema>;
