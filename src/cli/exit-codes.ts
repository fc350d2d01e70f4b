/**
 * Semantic exit codes for the paramstack CLI
 *
 * @see Use these constants instead of magic numbers throughout the CLI
 */
import { FormatError } from '../merge/errors.js';
import { WorkspaceError } from '../workspace/context.js';

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** General error (catch-all for unexpected errors) */
  ERROR: 1,

  /** Usage error (invalid arguments, flags, or command syntax) */
  USAGE_ERROR: 2,

  /** Not found (manifest, node, or parameter files don't exist) */
  NOT_FOUND: 3,

  /** Validation failed (malformed parameter file or invalid manifest) */
  VALIDATION_FAILED: 4,
} as const;

/**
 * Type for exit codes
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code metadata for documentation
 */
export const EXIT_CODE_METADATA = [
  {
    code: EXIT_CODES.SUCCESS,
    name: 'SUCCESS',
    description: 'Command completed successfully',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.ERROR,
    name: 'ERROR',
    description: 'General error (unexpected error, file system error, etc.)',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.USAGE_ERROR,
    name: 'USAGE_ERROR',
    description: 'Usage error (invalid arguments, flags, or command syntax)',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.NOT_FOUND,
    name: 'NOT_FOUND',
    description: 'Resource not found (manifest, node, parameter files)',
    commands: 'resolve, sources',
  },
  {
    code: EXIT_CODES.VALIDATION_FAILED,
    name: 'VALIDATION_FAILED',
    description: 'Validation failed (malformed parameter file, invalid manifest)',
    commands: 'merge, resolve, sources',
  },
] as const;

/**
 * Exit code for an error thrown by a command
 */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof FormatError) {
    return EXIT_CODES.VALIDATION_FAILED;
  }
  if (err instanceof WorkspaceError) {
    switch (err.code) {
      case 'MANIFEST_NOT_FOUND':
      case 'NODE_NOT_FOUND':
        return EXIT_CODES.NOT_FOUND;
      case 'INVALID_MANIFEST':
        return EXIT_CODES.VALIDATION_FAILED;
      case 'INVALID_NAME':
        return EXIT_CODES.USAGE_ERROR;
      case 'FILE_UNREADABLE':
        return EXIT_CODES.ERROR;
    }
  }
  return EXIT_CODES.ERROR;
}
