/**
 * =================================================================
 * @dockyard/cli - Command-Line Front End
 * =================================================================
 *
 * Resolves descriptor batches read from JSON files and edits the plugin
 * manifest. The `dockyard` binary is `main.ts`; everything it runs is
 * exported here.
 *
 * @packageDocumentation
 */

export { getConfig, DEFAULT_CONFIG_FILE } from "./config.js";
export { batchSchema, parseBatch, loadBatch } from "./batch.js";
export { formatReport } from "./report.js";
export {
  openManifest,
  runResolve,
  runSetEnabled,
  runList,
} from "./commands.js";
export { BatchError, CommandError } from "./errors.js";

export type { ConfigSource, LoadedConfig } from "./config.js";
export type {
  Batch,
  BatchInput,
  BatchPlugin,
  BatchDescriptor,
} from "./batch.js";
export type { CommandContext, ResolveOptions } from "./commands.js";
