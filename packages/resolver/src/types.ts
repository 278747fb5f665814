/**
 * Points at another descriptor by identity and accepts any version inside the
 * inclusive `[minVersion, maxVersion]` window.
 */
export type DescriptorReference = {
  /** The UUID of the plugin that owns the referenced descriptor. */
  readonly ownerId: string;
  /** The UUID of the referenced descriptor. */
  readonly descriptorId: string;
  /** Lowest acceptable version (inclusive), e.g. "1.0.0". */
  readonly minVersion: string;
  /** Highest acceptable version (inclusive), e.g. "2.0.0". */
  readonly maxVersion: string;
};

/**
 * The identity triple shared by every descriptor.
 */
export type DescriptorIdentity = {
  readonly ownerId: string;
  readonly descriptorId: string;
  readonly version: string;
};

/**
 * The shape every extension point reuses. Extension points add their own
 * payload fields on top of it (`Descriptor & { header: string }`).
 */
export type Descriptor = DescriptorIdentity & {
  /** Hard requirements. Any unmet reference excludes this descriptor. */
  readonly dependsOn?: readonly DescriptorReference[];
  /** Exclusion rules. A match excludes this descriptor (not the other one). */
  readonly conflictsWith?: readonly DescriptorReference[];
  /** Descriptors that should be ordered after this one. */
  readonly loadBefore?: readonly DescriptorReference[];
  /** Descriptors that should be ordered before this one. */
  readonly loadAfter?: readonly DescriptorReference[];
};

/**
 * What happens when the load-order hints contain a cycle.
 * - `break`: order the blocked descriptors by input position and report it.
 * - `reject`: throw a `CyclicOrderError`.
 */
export type CyclePolicy = "break" | "reject";

type DiagnosticBase = {
  /** Human-readable summary, identical to the logged line. */
  message: string;
};

/**
 * A recoverable condition recorded during a resolution run. Every excluded
 * descriptor has at least one of these.
 */
export type Diagnostic =
  | (DiagnosticBase & {
      kind: "duplicate";
      descriptor: DescriptorIdentity;
      /** The owner of the descriptor that was kept under the same id. */
      keptOwnerId: string;
    })
  | (DiagnosticBase & {
      kind: "missing-dependency";
      descriptor: DescriptorIdentity;
      reference: DescriptorReference;
    })
  | (DiagnosticBase & {
      kind: "version-mismatch";
      descriptor: DescriptorIdentity;
      reference: DescriptorReference;
      foundVersion: string;
    })
  | (DiagnosticBase & {
      kind: "conflict";
      descriptor: DescriptorIdentity;
      reference: DescriptorReference;
      conflictsWith: DescriptorIdentity;
    })
  | (DiagnosticBase & {
      kind: "cycle";
      /** The descriptors on the broken cycle, in input order. */
      members: DescriptorIdentity[];
      /** The descriptor emitted to break the stall. */
      brokenAt: DescriptorIdentity;
    });

export type DiagnosticKind = Diagnostic["kind"];
