/**
 * paramstack - layered parameter merge with provenance
 */

export * from './merge/index.js';
export * from './schema/index.js';
export * from './workspace/index.js';
export { EXIT_CODES, EXIT_CODE_METADATA, exitCodeFor, type ExitCode } from './cli/exit-codes.js';
