import type { DescriptorIdentity } from "./types.js";

/**
 * The base class for every error the resolver throws. Recoverable data
 * problems (duplicates, unmet dependencies, conflicts) are never thrown; they
 * are reported as diagnostics instead.
 */
export class ResolutionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ResolutionError";
    this.cause = cause;
  }
}

/**
 * Thrown when the identity index of a resolution context disagrees with the
 * descriptors it was built from. This means the context itself is corrupted,
 * so the run is aborted rather than producing a silently wrong order.
 */
export class ResolutionIntegrityError extends ResolutionError {
  public readonly descriptorId: string;

  constructor(descriptorId: string, message: string) {
    super(message);
    this.name = "ResolutionIntegrityError";
    this.descriptorId = descriptorId;
  }
}

/**
 * Thrown under the `reject` cycle policy when load-order hints cannot be
 * satisfied by any total order.
 */
export class CyclicOrderError extends ResolutionError {
  public readonly members: DescriptorIdentity[];

  constructor(members: DescriptorIdentity[]) {
    super(
      `Cyclic load-order hints among: ${members
        .map((m) => `${m.descriptorId}@${m.version}`)
        .join(", ")}`
    );
    this.name = "CyclicOrderError";
    this.members = members;
  }
}
