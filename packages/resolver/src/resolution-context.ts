import type { Descriptor, Diagnostic } from "./types.js";
import { DescriptorGraph } from "./descriptor-graph.js";
import { ResolutionIntegrityError } from "./errors.js";
import { formatDescriptor, identityOf } from "./descriptor.js";
import { normalizeId } from "./version.js";

/**
 * The working state of a single resolution run. It is created fresh for every
 * call and never shared, so the resolver itself stays stateless.
 */
export class ResolutionContext<T extends Descriptor> {
  /** Deduplicated descriptors in input order. */
  public readonly descriptors: readonly T[];
  /** Normalized descriptor id -> descriptor. */
  public readonly index: ReadonlyMap<string, T>;
  public readonly graph: DescriptorGraph<T> = new DescriptorGraph();

  /** Later occurrences of an id that was already taken, in input order. */
  public readonly duplicates: readonly T[];
  /** Descriptors with at least one unmet dependency. */
  public readonly dependencyDisabled: Set<T> = new Set();
  /** Descriptors that declared a conflict with another live descriptor. */
  public readonly conflictDisabled: Set<T> = new Set();

  public readonly diagnostics: Diagnostic[] = [];

  private readonly members: ReadonlySet<T>;

  constructor(
    descriptors: readonly T[],
    index: ReadonlyMap<string, T>,
    duplicates: Iterable<T> = []
  ) {
    this.descriptors = descriptors;
    this.index = index;
    this.duplicates = [...duplicates];
    this.members = new Set(descriptors);
    for (const descriptor of descriptors) {
      this.graph.add(descriptor);
    }
  }

  /**
   * Looks up a descriptor by id.
   * @returns The descriptor, or `undefined` if no descriptor has that id.
   * @throws A `ResolutionIntegrityError` if the index holds the key but its
   * entry is empty or does not belong to this context.
   */
  public lookup(descriptorId: string): T | undefined {
    const key = normalizeId(descriptorId);
    if (!this.index.has(key)) return undefined;

    const found = this.index.get(key);
    if (found === undefined) {
      throw new ResolutionIntegrityError(
        descriptorId,
        `Descriptor index reports ${descriptorId} but holds no descriptor for it.`
      );
    }
    if (normalizeId(found.descriptorId) !== key || !this.members.has(found)) {
      throw new ResolutionIntegrityError(
        descriptorId,
        `Descriptor index maps ${descriptorId} to ${formatDescriptor(found)}, which is not part of this resolution.`
      );
    }
    return found;
  }

  /**
   * Whether a surviving descriptor has been disabled so far.
   */
  public isExcluded(descriptor: T): boolean {
    return (
      this.dependencyDisabled.has(descriptor) ||
      this.conflictDisabled.has(descriptor)
    );
  }

  /**
   * Every descriptor left out of the result: disabled survivors in input
   * order, then duplicates.
   */
  public excluded(): T[] {
    return [
      ...this.descriptors.filter((d) => this.isExcluded(d)),
      ...this.duplicates,
    ];
  }

  public report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }
}

/**
 * Builds the context for one run: snapshots the input, drops later
 * occurrences of an id (first wins), indexes the survivors and seeds the
 * graph with one node per survivor.
 */
export function createResolutionContext<T extends Descriptor>(
  descriptors: Iterable<T>
): ResolutionContext<T> {
  const snapshot = [...descriptors];
  const index = new Map<string, T>();
  const survivors: T[] = [];
  const duplicates: T[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const descriptor of snapshot) {
    const key = normalizeId(descriptor.descriptorId);
    const kept = index.get(key);
    if (kept) {
      duplicates.push(descriptor);
      diagnostics.push({
        kind: "duplicate",
        descriptor: identityOf(descriptor),
        keptOwnerId: kept.ownerId,
        message: `Descriptor ${formatDescriptor(descriptor)} from ${descriptor.ownerId} is a duplicate of the one provided by ${kept.ownerId}; keeping the first.`,
      });
      continue;
    }
    index.set(key, descriptor);
    survivors.push(descriptor);
  }

  const context = new ResolutionContext(survivors, index, duplicates);
  for (const diagnostic of diagnostics) context.report(diagnostic);
  return context;
}
