import type {
  CyclePolicy,
  Descriptor,
  DescriptorReference,
  Diagnostic,
} from "./types.js";
import {
  ResolutionContext,
  createResolutionContext,
} from "./resolution-context.js";
import { ResolutionError } from "./errors.js";
import { formatDescriptor, identityOf } from "./descriptor.js";
import { formatReference, matchesReference } from "./version.js";
import { createLogger, type Logger } from "./logger.js";

export type DescriptorResolverOptions = {
  /** @default createLogger("DescriptorResolver") */
  logger?: Logger;
  /**
   * How cyclic load-order hints are handled.
   * @default "break"
   */
  cycles?: CyclePolicy;
};

/**
 * The outcome of `DescriptorResolver.resolveContext()`.
 */
export type ResolutionResult<T extends Descriptor> = {
  /** Surviving descriptors, in load order. */
  ordered: readonly T[];
  /** Exclusion sets and diagnostics of the run. */
  context: ResolutionContext<T>;
};

/**
 * Turns an unordered batch of descriptors into a deterministic load order.
 *
 * A run deduplicates by descriptor id (first wins), then evaluates every
 * survivor in input order:
 *
 * - `dependsOn`: every reference must find a descriptor with a version inside
 *   its window. Otherwise the declaring descriptor is excluded.
 * - `conflictsWith`: if a reference matches any other descriptor, the
 *   declaring descriptor is excluded. The other descriptor is kept unless it
 *   declares the conflict too.
 * - `loadBefore` / `loadAfter`: add ordering edges to matching descriptors
 *   that are not excluded.
 *
 * A dependency only has to be present in the batch with a matching version;
 * whether that descriptor is itself excluded does not matter. The remaining
 * graph is sorted with input position as the only tie-breaker.
 *
 * Nothing in the input ever makes a run throw, except cyclic hints under the
 * `reject` policy. Every exclusion is logged as a warning and recorded as a
 * diagnostic.
 */
export class DescriptorResolver {
  private readonly logger: Logger;
  private readonly cycles: CyclePolicy;

  constructor(options: DescriptorResolverOptions = {}) {
    this.logger = options.logger ?? createLogger("DescriptorResolver");
    this.cycles = options.cycles ?? "break";
  }

  /**
   * Resolves a batch and returns the surviving descriptors in load order.
   * The returned elements are the same objects that were passed in.
   */
  public resolve<T extends Descriptor>(descriptors: Iterable<T>): readonly T[] {
    return this.resolveContext(descriptors).ordered;
  }

  /**
   * Resolves a batch and also returns the context, for callers that need to
   * show why something was left out.
   */
  public resolveContext<T extends Descriptor>(
    descriptors: Iterable<T>
  ): ResolutionResult<T> {
    const context = createResolutionContext(descriptors);
    const ordered = this.evaluate(context);
    return { ordered, context };
  }

  /**
   * Evaluates an already built context in place and sorts what survives.
   * @throws A `ResolutionIntegrityError` if the context's index is corrupted.
   * @throws A `CyclicOrderError` under the `reject` policy.
   */
  public evaluate<T extends Descriptor>(context: ResolutionContext<T>): T[] {
    for (const diagnostic of context.diagnostics) {
      this.logger.warn(diagnostic.message);
    }

    try {
      for (const descriptor of context.descriptors) {
        this.processDependencies(descriptor, context);
        this.processConflicts(descriptor, context);
        this.processLoadBefore(descriptor, context);
        this.processLoadAfter(descriptor, context);
      }

      this.removeInvalidDescriptors(context);

      const ordered = context.graph.sort({
        cycles: this.cycles,
        onCycleBroken: (members, brokenAt) =>
          this.report(context, {
            kind: "cycle",
            members: members.map(identityOf),
            brokenAt: identityOf(brokenAt),
            message: `Cyclic load-order hints among ${members.length} descriptor(s) (${members
              .map(formatDescriptor)
              .join(", ")}); ordering ${formatDescriptor(brokenAt)} first.`,
          }),
      });

      this.logger.debug(
        `Resolved ${ordered.length} of ${
          context.descriptors.length + context.duplicates.length
        } descriptor(s).`,
        { excluded: context.excluded().map(formatDescriptor) }
      );
      return ordered;
    } catch (error) {
      if (error instanceof ResolutionError) {
        this.logger.error(error.message, { error: error.name });
      }
      throw error;
    }
  }

  private processDependencies<T extends Descriptor>(
    descriptor: T,
    context: ResolutionContext<T>
  ): void {
    for (const dependency of descriptor.dependsOn ?? []) {
      const target = context.lookup(dependency.descriptorId);

      if (!target) {
        context.dependencyDisabled.add(descriptor);
        this.report(context, {
          kind: "missing-dependency",
          descriptor: identityOf(descriptor),
          reference: dependency,
          message: `Descriptor ${formatDescriptor(descriptor)} depends on ${formatReference(dependency)}, but it is missing.`,
        });
      } else if (!this.matches(dependency, target)) {
        context.dependencyDisabled.add(descriptor);
        this.report(context, {
          kind: "version-mismatch",
          descriptor: identityOf(descriptor),
          reference: dependency,
          foundVersion: target.version,
          message: `Descriptor ${formatDescriptor(descriptor)} depends on ${formatReference(dependency)}, but found version ${target.version}.`,
        });
      }
    }
  }

  private processConflicts<T extends Descriptor>(
    descriptor: T,
    context: ResolutionContext<T>
  ): void {
    const conflicts = descriptor.conflictsWith;
    if (!conflicts || conflicts.length === 0) return;

    for (const other of context.graph.getNodes()) {
      if (other === descriptor) continue;

      const conflict = conflicts.find((c) => this.matches(c, other));
      if (conflict) {
        context.conflictDisabled.add(descriptor);
        this.report(context, {
          kind: "conflict",
          descriptor: identityOf(descriptor),
          reference: conflict,
          conflictsWith: identityOf(other),
          message: `Descriptor ${formatDescriptor(descriptor)} conflicts with ${formatReference(conflict)}, but both are enabled (found: ${other.version}).`,
        });
        return;
      }
    }
  }

  private processLoadBefore<T extends Descriptor>(
    descriptor: T,
    context: ResolutionContext<T>
  ): void {
    for (const before of descriptor.loadBefore ?? []) {
      const target = this.orderingTarget(before, context);
      if (target) context.graph.addEdge(descriptor, target);
    }
  }

  private processLoadAfter<T extends Descriptor>(
    descriptor: T,
    context: ResolutionContext<T>
  ): void {
    for (const after of descriptor.loadAfter ?? []) {
      const target = this.orderingTarget(after, context);
      if (target) context.graph.addEdge(target, descriptor);
    }
  }

  /**
   * Resolves a load hint to a live descriptor, if there is one. Hints towards
   * missing, mismatched or excluded descriptors are dropped without a
   * diagnostic.
   */
  private orderingTarget<T extends Descriptor>(
    hint: DescriptorReference,
    context: ResolutionContext<T>
  ): T | undefined {
    const target = context.lookup(hint.descriptorId);
    if (!target || !this.matches(hint, target) || context.isExcluded(target)) {
      return undefined;
    }
    return target;
  }

  private removeInvalidDescriptors<T extends Descriptor>(
    context: ResolutionContext<T>
  ): void {
    for (const descriptor of context.descriptors) {
      if (context.isExcluded(descriptor)) context.graph.remove(descriptor);
    }
  }

  private matches(reference: DescriptorReference, target: Descriptor): boolean {
    return matchesReference(
      reference,
      target.ownerId,
      target.descriptorId,
      target.version
    );
  }

  private report<T extends Descriptor>(
    context: ResolutionContext<T>,
    diagnostic: Diagnostic
  ): void {
    context.report(diagnostic);
    this.logger.warn(diagnostic.message);
  }
}
