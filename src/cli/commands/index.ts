export { registerMergeCommand } from './merge.js';
export { registerResolveCommand, registerSourcesCommand } from './resolve.js';
