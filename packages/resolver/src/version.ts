import * as semver from "semver";
import type { DescriptorReference } from "./types.js";

/**
 * UUIDs are case-insensitive, so every id is compared in lower case.
 */
export function normalizeId(id: string): string {
  return id.toLowerCase();
}

/**
 * Checks whether `version` lies within `[min, max]` (both inclusive) using
 * semantic-version precedence, so "1.10.0" sorts after "1.9.0" and
 * "2.0.0-beta.1" sorts before "2.0.0".
 *
 * Any unparsable input makes the check fail instead of throwing.
 */
export function isVersionInRange(
  version: string,
  min: string,
  max: string
): boolean {
  const actual = semver.parse(version);
  const lower = semver.parse(min);
  const upper = semver.parse(max);
  if (!actual || !lower || !upper) return false;

  return semver.compare(actual, lower) >= 0 && semver.compare(actual, upper) <= 0;
}

/**
 * Tests a candidate descriptor against a reference: owner id and descriptor
 * id must be equal and the version must be inside the reference's window.
 */
export function matchesReference(
  reference: DescriptorReference,
  ownerId: string,
  descriptorId: string,
  version: string
): boolean {
  if (
    normalizeId(reference.ownerId) !== normalizeId(ownerId) ||
    normalizeId(reference.descriptorId) !== normalizeId(descriptorId)
  ) {
    return false;
  }
  return isVersionInRange(version, reference.minVersion, reference.maxVersion);
}

/**
 * Renders a reference the way diagnostics print it:
 * `<descriptorId> (version in [min, max])`.
 */
export function formatReference(reference: DescriptorReference): string {
  return `${reference.descriptorId} (version in [${reference.minVersion}, ${reference.maxVersion}])`;
}
