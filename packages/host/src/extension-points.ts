import type { z } from "zod";
import type { Descriptor } from "@dockyard/resolver";
import type { Plugin } from "./types.js";
import {
  ExtensionRegistry,
  defineExtensionPoint,
} from "./extension-registry.js";

// --- Descriptor types ---

export type ServiceLifetime = "singleton" | "scoped" | "transient";

/** Contributes a service registration to the host container. */
export type ServiceDescriptor = Descriptor & {
  /** The key the service is registered under. */
  readonly token: string;
  readonly lifetime: ServiceLifetime;
  readonly factory: () => unknown;
};

/** A page in the main navigation. Also used for settings pages. */
export type PageDescriptor = Descriptor & {
  readonly name: string;
  readonly iconSource: string;
  readonly createView: () => unknown;
};

/** A top-level view the main window can switch to, selected by `key`. */
export type MainViewDescriptor = Descriptor & {
  readonly key: string;
  readonly createView: () => unknown;
};

export type DockPanelDescriptor = Descriptor & {
  readonly header: string;
  readonly group?: string;
  readonly tags?: readonly string[];
  /** Ids of the dock hosts this panel may be placed in. Empty means any. */
  readonly targetedHosts?: readonly string[];
  readonly createView: () => unknown;
};

/** Registers a configuration section and the schema it is validated with. */
export type ConfigurationDescriptor = Descriptor & {
  readonly section: string;
  readonly schema: z.ZodTypeAny;
};

/** Mutable settings bag handed to `appConfig` and `appEnv` descriptors. */
export type SettingsBag = Record<string, unknown>;

export type AppConfigDescriptor = Descriptor & {
  readonly configure: (config: SettingsBag) => void;
};

export type AppEnvDescriptor = Descriptor & {
  readonly configure: (env: SettingsBag) => void;
};

/** Runs once after services are registered. */
export type AppSetupDescriptor = Descriptor & {
  readonly setup: (services: ReadonlyMap<string, unknown>) => void;
};

// --- Provider interfaces ---

export interface ServiceProvider extends Plugin {
  getServiceDescriptors(): Iterable<ServiceDescriptor>;
}

export interface PageProvider extends Plugin {
  getPageDescriptors(): Iterable<PageDescriptor>;
}

export interface SettingsPageProvider extends Plugin {
  getSettingsPageDescriptors(): Iterable<PageDescriptor>;
}

export interface MainViewProvider extends Plugin {
  getMainViewDescriptors(): Iterable<MainViewDescriptor>;
}

export interface DockPanelProvider extends Plugin {
  getDockPanelDescriptors(): Iterable<DockPanelDescriptor>;
}

export interface ConfigurationProvider extends Plugin {
  getConfigurationDescriptors(): Iterable<ConfigurationDescriptor>;
}

export interface AppConfigProvider extends Plugin {
  getAppConfigDescriptors(): Iterable<AppConfigDescriptor>;
}

export interface AppEnvProvider extends Plugin {
  getAppEnvDescriptors(): Iterable<AppEnvDescriptor>;
}

export interface AppSetupProvider extends Plugin {
  getAppSetupDescriptors(): Iterable<AppSetupDescriptor>;
}

// --- Points ---

/**
 * Service registrations. Consumed in reverse so that a teardown pass
 * releases services in the opposite order they were registered.
 */
export const services = defineExtensionPoint<ServiceProvider, ServiceDescriptor>({
  name: "services",
  direction: "reverse",
  collect: (provider) => provider.getServiceDescriptors(),
});

export const pages = defineExtensionPoint<PageProvider, PageDescriptor>({
  name: "pages",
  direction: "forward",
  collect: (provider) => provider.getPageDescriptors(),
});

export const settingsPages = defineExtensionPoint<
  SettingsPageProvider,
  PageDescriptor
>({
  name: "settingsPages",
  direction: "forward",
  collect: (provider) => provider.getSettingsPageDescriptors(),
});

export const mainViews = defineExtensionPoint<
  MainViewProvider,
  MainViewDescriptor
>({
  name: "mainViews",
  direction: "forward",
  collect: (provider) => provider.getMainViewDescriptors(),
});

export const dockPanels = defineExtensionPoint<
  DockPanelProvider,
  DockPanelDescriptor
>({
  name: "dockPanels",
  direction: "forward",
  collect: (provider) => provider.getDockPanelDescriptors(),
});

export const configurations = defineExtensionPoint<
  ConfigurationProvider,
  ConfigurationDescriptor
>({
  name: "configurations",
  direction: "forward",
  collect: (provider) => provider.getConfigurationDescriptors(),
});

export const appConfig = defineExtensionPoint<
  AppConfigProvider,
  AppConfigDescriptor
>({
  name: "appConfig",
  direction: "forward",
  collect: (provider) => provider.getAppConfigDescriptors(),
});

export const appEnv = defineExtensionPoint<AppEnvProvider, AppEnvDescriptor>({
  name: "appEnv",
  direction: "forward",
  collect: (provider) => provider.getAppEnvDescriptors(),
});

export const appSetup = defineExtensionPoint<
  AppSetupProvider,
  AppSetupDescriptor
>({
  name: "appSetup",
  direction: "forward",
  collect: (provider) => provider.getAppSetupDescriptors(),
});

/**
 * Creates a registry holding every built-in point.
 */
export function createDefaultRegistry(): ExtensionRegistry {
  const registry = new ExtensionRegistry();
  registry.define(services);
  registry.define(pages);
  registry.define(settingsPages);
  registry.define(mainViews);
  registry.define(dockPanels);
  registry.define(configurations);
  registry.define(appConfig);
  registry.define(appEnv);
  registry.define(appSetup);
  return registry;
}
