/**
 * =================================================================
 * @dockyard/host - Extension Points for the Descriptor Resolver
 * =================================================================
 *
 * Connects plugins to the resolver: an explicit table of extension points
 * (what to collect from a plugin and which way to consume the result), a
 * manifest of which plugins are enabled per point, and the host
 * configuration.
 *
 * @packageDocumentation
 */

// --- Core Classes ---
export { DescriptorHost } from "./descriptor-host.js";
export {
  ExtensionRegistry,
  defineExtensionPoint,
} from "./extension-registry.js";
export { LokiManifestStore } from "./manifest.js";

// --- Built-in Extension Points ---
export {
  createDefaultRegistry,
  services,
  pages,
  settingsPages,
  mainViews,
  dockPanels,
  configurations,
  appConfig,
  appEnv,
  appSetup,
} from "./extension-points.js";

// --- Configuration ---
export { hostConfigSchema, parseHostConfig, loadHostConfig } from "./config.js";

// --- Errors ---
export { ExtensionPointError, ConfigError } from "./errors.js";

// --- Public Types ---
export type { Plugin, Direction } from "./types.js";
export type { ExtensionPoint } from "./extension-registry.js";
export type {
  DescriptorHostOptions,
  ApplyResult,
  ApplyFailure,
} from "./descriptor-host.js";
export type {
  ManifestStore,
  ManifestEntry,
  DiscoveredEntry,
} from "./manifest.js";
export type { HostConfig, HostConfigInput, ManifestConfig } from "./config.js";
export type {
  ServiceLifetime,
  ServiceDescriptor,
  PageDescriptor,
  MainViewDescriptor,
  DockPanelDescriptor,
  ConfigurationDescriptor,
  SettingsBag,
  AppConfigDescriptor,
  AppEnvDescriptor,
  AppSetupDescriptor,
  ServiceProvider,
  PageProvider,
  SettingsPageProvider,
  MainViewProvider,
  DockPanelProvider,
  ConfigurationProvider,
  AppConfigProvider,
  AppEnvProvider,
  AppSetupProvider,
} from "./extension-points.js";
