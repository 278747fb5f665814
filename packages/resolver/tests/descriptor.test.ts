import { describe, it, expect } from "vitest";
import {
  defineDescriptor,
  formatDescriptor,
  identityOf,
  reference,
} from "../src/index.js";
import { OWNER, node, refTo } from "./helpers.js";

const ID = "6f1c3a52-8d7e-4b0a-9c55-2f4e1d0b7a11";

describe("defineDescriptor", () => {
  it("freezes the descriptor and its relation lists", () => {
    const d = node("A", { dependsOn: [refTo(ID)] });

    expect(Object.isFrozen(d)).toBe(true);
    expect(Object.isFrozen(d.dependsOn)).toBe(true);
    expect(Object.isFrozen(d.dependsOn?.[0])).toBe(true);
  });

  it("returns the object it was given", () => {
    const raw = { ownerId: OWNER, descriptorId: ID, version: "1.0.0", extra: 42 };
    const d = defineDescriptor(raw);

    expect(d).toBe(raw);
    expect(d.extra).toBe(42);
  });

  it("rejects ids that are not UUIDs", () => {
    expect(() =>
      defineDescriptor({ ownerId: OWNER, descriptorId: "not-a-uuid", version: "1.0.0" })
    ).toThrow(new TypeError('Invalid descriptorId: "not-a-uuid" is not a UUID.'));
  });

  it("rejects references with malformed ids", () => {
    expect(() =>
      defineDescriptor({
        ownerId: OWNER,
        descriptorId: ID,
        version: "1.0.0",
        loadAfter: [{ ownerId: OWNER, descriptorId: "x", minVersion: "1.0.0", maxVersion: "1.0.0" }],
      })
    ).toThrow(new TypeError('Invalid loadAfter descriptorId: "x" is not a UUID.'));
  });
});

describe("reference", () => {
  it("collapses the window to one version when max is omitted", () => {
    expect(reference({ ownerId: OWNER, descriptorId: ID }, "1.2.3")).toEqual({
      ownerId: OWNER,
      descriptorId: ID,
      minVersion: "1.2.3",
      maxVersion: "1.2.3",
    });
  });
});

describe("identity helpers", () => {
  it("strips payload fields and formats as id@version", () => {
    const d = node("A", { descriptorId: ID, version: "2.1.0" });

    expect(identityOf(d)).toEqual({ ownerId: OWNER, descriptorId: ID, version: "2.1.0" });
    expect(formatDescriptor(d)).toBe(`${ID}@2.1.0`);
  });
});
