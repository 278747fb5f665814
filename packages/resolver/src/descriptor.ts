import { validate as isUuid } from "uuid";
import type {
  Descriptor,
  DescriptorIdentity,
  DescriptorReference,
} from "./types.js";

const RELATIONS = [
  "dependsOn",
  "conflictsWith",
  "loadBefore",
  "loadAfter",
] as const;

function assertUuid(value: string, field: string): void {
  if (!isUuid(value)) {
    throw new TypeError(`Invalid ${field}: "${value}" is not a UUID.`);
  }
}

/**
 * Validates the ids of a descriptor and freezes it together with its relation
 * lists. The same object is returned, so payload fields keep their types.
 *
 * @throws A `TypeError` if the owner, descriptor or any referenced id is not a UUID.
 */
export function defineDescriptor<T extends Descriptor>(descriptor: T): Readonly<T> {
  assertUuid(descriptor.ownerId, "ownerId");
  assertUuid(descriptor.descriptorId, "descriptorId");

  for (const relation of RELATIONS) {
    const references: readonly DescriptorReference[] | undefined =
      descriptor[relation];
    if (!references) continue;
    for (const reference of references) {
      assertUuid(reference.ownerId, `${relation} ownerId`);
      assertUuid(reference.descriptorId, `${relation} descriptorId`);
      Object.freeze(reference);
    }
    Object.freeze(references);
  }

  return Object.freeze(descriptor);
}

/**
 * Builds a reference to `target`. When `maxVersion` is omitted the window
 * collapses to exactly `minVersion`.
 */
export function reference(
  target: Pick<DescriptorIdentity, "ownerId" | "descriptorId">,
  minVersion: string,
  maxVersion: string = minVersion
): DescriptorReference {
  assertUuid(target.ownerId, "ownerId");
  assertUuid(target.descriptorId, "descriptorId");
  return Object.freeze({
    ownerId: target.ownerId,
    descriptorId: target.descriptorId,
    minVersion,
    maxVersion,
  });
}

/**
 * Strips a descriptor down to its identity triple for diagnostics.
 */
export function identityOf(descriptor: DescriptorIdentity): DescriptorIdentity {
  return {
    ownerId: descriptor.ownerId,
    descriptorId: descriptor.descriptorId,
    version: descriptor.version,
  };
}

/** `<descriptorId>@<version>` */
export function formatDescriptor(descriptor: DescriptorIdentity): string {
  return `${descriptor.descriptorId}@${descriptor.version}`;
}
