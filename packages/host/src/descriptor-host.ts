import {
  DescriptorResolver,
  createLogger,
  formatDescriptor,
  type Descriptor,
  type Logger,
  type ResolutionResult,
} from "@dockyard/resolver";
import type { Plugin } from "./types.js";
import type { ManifestStore } from "./manifest.js";
import type { ExtensionPoint, ExtensionRegistry } from "./extension-registry.js";
import { createDefaultRegistry } from "./extension-points.js";
import { ExtensionPointError } from "./errors.js";

export type DescriptorHostOptions = {
  /** @default new DescriptorResolver() */
  resolver?: DescriptorResolver;
  /** When given, only providers enabled for a point are collected from. */
  manifest?: ManifestStore;
  /** @default createDefaultRegistry() */
  registry?: ExtensionRegistry;
  logger?: Logger;
};

export type ApplyFailure<T extends Descriptor> = {
  descriptor: T;
  error: unknown;
};

export type ApplyResult<T extends Descriptor> = {
  /** Descriptors the consumer accepted, in the order they were applied. */
  applied: T[];
  failed: ApplyFailure<T>[];
};

/**
 * Gathers descriptors for an extension point from many plugins and hands back
 * a single resolved order.
 *
 * @example
 * ```ts
 * const host = new DescriptorHost({ manifest });
 * for (const page of host.resolve(pages, plugins)) {
 *   navigation.add(page.name, page.createView);
 * }
 * ```
 */
export class DescriptorHost {
  public readonly registry: ExtensionRegistry;
  private readonly resolver: DescriptorResolver;
  private readonly manifest?: ManifestStore;
  private readonly logger: Logger;

  constructor(options: DescriptorHostOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.resolver = options.resolver ?? new DescriptorResolver();
    this.manifest = options.manifest;
    this.logger = options.logger ?? createLogger("DescriptorHost");
  }

  /**
   * Collects, resolves and (for reverse points) reverses.
   * @throws An `ExtensionPointError` if the point is not in this host's registry.
   */
  public resolve<TProvider extends Plugin, TDescriptor extends Descriptor>(
    point: ExtensionPoint<TProvider, TDescriptor>,
    providers: Iterable<TProvider>
  ): readonly TDescriptor[] {
    return this.resolveContext(point, providers).ordered;
  }

  /**
   * Like `resolve()`, but also returns the resolution context.
   */
  public resolveContext<
    TProvider extends Plugin,
    TDescriptor extends Descriptor,
  >(
    point: ExtensionPoint<TProvider, TDescriptor>,
    providers: Iterable<TProvider>
  ): ResolutionResult<TDescriptor> {
    if (!this.registry.owns(point)) {
      throw new ExtensionPointError(
        point.name,
        `Extension point '${point.name}' is not registered with this host.`
      );
    }

    const batch = this.collect(point, providers);
    const { ordered, context } = this.resolver.resolveContext(batch);

    this.logger.debug(
      `Resolved ${ordered.length} of ${batch.length} descriptor(s) for '${point.name}'.`
    );

    return {
      ordered: point.direction === "reverse" ? [...ordered].reverse() : ordered,
      context,
    };
  }

  /**
   * Resolves a point and passes each descriptor to `consumer` in order. A
   * consumer that throws is logged and recorded; the rest still run.
   */
  public apply<TProvider extends Plugin, TDescriptor extends Descriptor>(
    point: ExtensionPoint<TProvider, TDescriptor>,
    providers: Iterable<TProvider>,
    consumer: (descriptor: TDescriptor) => void
  ): ApplyResult<TDescriptor> {
    const result: ApplyResult<TDescriptor> = { applied: [], failed: [] };

    for (const descriptor of this.resolve(point, providers)) {
      try {
        consumer(descriptor);
        result.applied.push(descriptor);
      } catch (error) {
        this.logger.error(
          `Failed to apply ${formatDescriptor(descriptor)} from ${descriptor.ownerId} to '${point.name}'.`,
          { error }
        );
        result.failed.push({ descriptor, error });
      }
    }

    this.logger.info(
      `Applied ${result.applied.length} '${point.name}' descriptor(s), ${result.failed.length} failed.`
    );
    return result;
  }

  private collect<TProvider extends Plugin, TDescriptor extends Descriptor>(
    point: ExtensionPoint<TProvider, TDescriptor>,
    providers: Iterable<TProvider>
  ): TDescriptor[] {
    const batch: TDescriptor[] = [];

    for (const provider of providers) {
      if (this.manifest && !this.manifest.isEnabled(provider.id, point.name)) {
        this.logger.debug(
          `Skipping ${provider.id} for '${point.name}': not enabled in the manifest.`
        );
        continue;
      }

      try {
        batch.push(...Array.from(point.collect(provider)));
      } catch (error) {
        this.logger.error(
          `Provider ${provider.id} failed to supply '${point.name}' descriptors; skipping it.`,
          { error }
        );
      }
    }

    return batch;
  }
}
