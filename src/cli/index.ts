/**
 * CLI Module Exports
 *
 * Re-exports all CLI commands and utilities.
 */

// Commands
export { replCommand, runRepl } from './repl.js';
export { askCommand } from './ask.js';
export { templatesCommand } from './templates.js';

// Utilities
export {
  color,
  supportsColor,
  paint,
  loadConfig,
  configureLogging,
  fatal,
} from './utils.js';
export { createCliInfobot } from './context.js';

export type { CliConfig, ConfigSources } from './utils.js';
export type { CommonOptions } from './context.js';
export type { ReplIO } from './repl.js';
