/**
 * =================================================================
 * @dockyard/resolver - Descriptor Resolution Engine
 * =================================================================
 *
 * Plugins contribute descriptors to extension points. Descriptors declare
 * dependencies, conflicts and load-order hints on each other; this package
 * turns an unordered batch of them into a single deterministic load order and
 * records why anything was left out.
 *
 * @packageDocumentation
 */

// --- Core Classes ---
export { DescriptorResolver } from "./descriptor-resolver.js";
export { DescriptorGraph } from "./descriptor-graph.js";
export {
  ResolutionContext,
  createResolutionContext,
} from "./resolution-context.js";

// --- Descriptors & Versions ---
export {
  defineDescriptor,
  reference,
  identityOf,
  formatDescriptor,
} from "./descriptor.js";
export {
  isVersionInRange,
  matchesReference,
  normalizeId,
  formatReference,
} from "./version.js";

// --- Logging ---
export { createLogger } from "./logger.js";

// --- Errors ---
export {
  ResolutionError,
  ResolutionIntegrityError,
  CyclicOrderError,
} from "./errors.js";

// --- Public Types ---
export type {
  Descriptor,
  DescriptorIdentity,
  DescriptorReference,
  Diagnostic,
  DiagnosticKind,
  CyclePolicy,
} from "./types.js";
export type {
  DescriptorResolverOptions,
  ResolutionResult,
} from "./descriptor-resolver.js";
export type { SortOptions } from "./descriptor-graph.js";
export type {
  Logger,
  LogLevel,
  LogData,
  LogSink,
  LoggerOptions,
} from "./logger.js";
