import { vi } from "vitest";
import { v4 as uuid } from "uuid";
import {
  createLogger,
  defineDescriptor,
  reference,
  type Descriptor,
  type DescriptorIdentity,
  type DescriptorReference,
  type LogSink,
} from "../src/index.js";

export type TestDescriptor = Descriptor & { name: string };

export const OWNER = uuid();

/**
 * Builds a frozen descriptor owned by `OWNER` at version 1.0.0 unless the
 * fields say otherwise.
 */
export function node(
  name: string,
  fields: Partial<Omit<TestDescriptor, "name">> = {}
): TestDescriptor {
  return defineDescriptor({
    ownerId: OWNER,
    descriptorId: uuid(),
    version: "1.0.0",
    name,
    ...fields,
  });
}

/** A reference to an id that may not have a descriptor yet. */
export function refTo(
  descriptorId: string,
  minVersion = "1.0.0",
  maxVersion = minVersion,
  ownerId = OWNER
): DescriptorReference {
  return reference({ ownerId, descriptorId }, minVersion, maxVersion);
}

export function refOf(target: DescriptorIdentity): DescriptorReference {
  return reference(target, target.version);
}

export function names(descriptors: readonly TestDescriptor[]): string[] {
  return descriptors.map((d) => d.name);
}

export function recordingLogger(scope = "DescriptorResolver") {
  const sink = vi.fn<LogSink>();
  return { sink, logger: createLogger(scope, { level: "debug", sink }) };
}
