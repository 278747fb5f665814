import type { Descriptor } from "@dockyard/resolver";
import type { Direction, Plugin } from "./types.js";
import { ExtensionPointError } from "./errors.js";

/**
 * Describes how the host gathers one kind of descriptor from plugins.
 *
 * @template TProvider The plugin shape that contributes to this point.
 * @template TDescriptor The descriptor type it contributes.
 */
export interface ExtensionPoint<
  TProvider extends Plugin = Plugin,
  TDescriptor extends Descriptor = Descriptor,
> {
  /** Unique key of the point, e.g. "pages". Also the manifest key. */
  readonly name: string;
  readonly direction: Direction;
  /** Reads the descriptors a single provider contributes. */
  collect(provider: TProvider): Iterable<TDescriptor>;
}

/**
 * Declares an extension point. The result is frozen.
 *
 * @example
 * ```ts
 * const widgets = defineExtensionPoint<WidgetProvider, WidgetDescriptor>({
 *   name: "widgets",
 *   direction: "forward",
 *   collect: (provider) => provider.getWidgetDescriptors(),
 * });
 * ```
 */
export function defineExtensionPoint<
  TProvider extends Plugin,
  TDescriptor extends Descriptor,
>(
  point: ExtensionPoint<TProvider, TDescriptor>
): ExtensionPoint<TProvider, TDescriptor> {
  return Object.freeze({ ...point });
}

/**
 * The table of extension points a host knows about, keyed by name.
 */
export class ExtensionRegistry {
  private readonly points = new Map<string, ExtensionPoint>();

  /**
   * Registers a point.
   * @throws An `ExtensionPointError` if the name is taken.
   */
  public define<TProvider extends Plugin, TDescriptor extends Descriptor>(
    point: ExtensionPoint<TProvider, TDescriptor>
  ): ExtensionPoint<TProvider, TDescriptor> {
    if (this.points.has(point.name)) {
      throw new ExtensionPointError(
        point.name,
        `Extension point '${point.name}' is already defined.`
      );
    }
    this.points.set(point.name, point);
    return point;
  }

  public get(name: string): ExtensionPoint | undefined {
    return this.points.get(name);
  }

  public has(name: string): boolean {
    return this.points.has(name);
  }

  /**
   * Checks that this exact point object is the one registered under its name.
   */
  public owns(point: ExtensionPoint): boolean {
    return this.points.get(point.name) === point;
  }

  /** Registered names, in registration order. */
  public names(): string[] {
    return Array.from(this.points.keys());
  }
}
