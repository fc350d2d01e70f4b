/**
 * Centralized strings and messages for user-facing text
 *
 * Single source of truth for error wording shared by the library and the CLI.
 */

export * from './errors.js';
