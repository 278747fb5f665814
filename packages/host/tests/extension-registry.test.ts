import { describe, it, expect } from "vitest";
import type { Descriptor } from "@dockyard/resolver";
import {
  ExtensionPointError,
  ExtensionRegistry,
  createDefaultRegistry,
  defineExtensionPoint,
  pages,
  services,
  type Plugin,
} from "../src/index.js";

interface WidgetProvider extends Plugin {
  widgets(): Descriptor[];
}

const widgets = defineExtensionPoint<WidgetProvider, Descriptor>({
  name: "widgets",
  direction: "forward",
  collect: (provider) => provider.widgets(),
});

describe("ExtensionRegistry", () => {
  it("holds every built-in point in the default table", () => {
    const registry = createDefaultRegistry();

    expect(registry.names()).toEqual([
      "services",
      "pages",
      "settingsPages",
      "mainViews",
      "dockPanels",
      "configurations",
      "appConfig",
      "appEnv",
      "appSetup",
    ]);
    expect(registry.get("services")).toBe(services);
    expect(services.direction).toBe("reverse");
    expect(pages.direction).toBe("forward");
  });

  it("rejects a second point under the same name", () => {
    const registry = createDefaultRegistry();
    const impostor = defineExtensionPoint<WidgetProvider, Descriptor>({
      ...widgets,
      name: "pages",
    });

    expect(() => registry.define(impostor)).toThrow(
      new ExtensionPointError("pages", "Extension point 'pages' is already defined.")
    );
    expect(registry.get("pages")).toBe(pages);
    expect(registry.owns(impostor)).toBe(false);
  });

  it("accepts custom points", () => {
    const registry = new ExtensionRegistry();

    expect(registry.define(widgets)).toBe(widgets);
    expect(registry.has("widgets")).toBe(true);
    expect(registry.owns(widgets)).toBe(true);
    expect(registry.has("pages")).toBe(false);
    expect(registry.get("pages")).toBeUndefined();
  });

  it("freezes defined points", () => {
    expect(Object.isFrozen(widgets)).toBe(true);
  });
});
