import { describe, it, expect } from "vitest";
import {
  formatReference,
  isVersionInRange,
  matchesReference,
} from "../src/index.js";
import { OWNER, refTo } from "./helpers.js";

describe("isVersionInRange", () => {
  it("includes both ends of the window", () => {
    expect(isVersionInRange("1.0.0", "1.0.0", "2.0.0")).toBe(true);
    expect(isVersionInRange("2.0.0", "1.0.0", "2.0.0")).toBe(true);
    expect(isVersionInRange("1.5.3", "1.0.0", "2.0.0")).toBe(true);
  });

  it("excludes versions just outside the window", () => {
    expect(isVersionInRange("0.9.9", "1.0.0", "2.0.0")).toBe(false);
    expect(isVersionInRange("2.0.1", "1.0.0", "2.0.0")).toBe(false);
  });

  it("compares numerically rather than lexically", () => {
    expect(isVersionInRange("1.10.0", "1.9.0", "1.10.0")).toBe(true);
    expect(isVersionInRange("1.9.0", "1.10.0", "2.0.0")).toBe(false);
  });

  it("orders pre-releases before their release", () => {
    expect(isVersionInRange("2.0.0-beta.1", "1.0.0", "2.0.0")).toBe(true);
    expect(isVersionInRange("2.0.0-beta.1", "2.0.0", "3.0.0")).toBe(false);
  });

  it("treats unparsable versions as no match", () => {
    expect(isVersionInRange("1.2", "1.0.0", "2.0.0")).toBe(false);
    expect(isVersionInRange("banana", "1.0.0", "2.0.0")).toBe(false);
    expect(isVersionInRange("1.5.0", "one", "2.0.0")).toBe(false);
    expect(isVersionInRange("1.5.0", "1.0.0", "")).toBe(false);
  });

  it("matches nothing when min is above max", () => {
    expect(isVersionInRange("1.5.0", "2.0.0", "1.0.0")).toBe(false);
  });
});

describe("matchesReference", () => {
  const target = "6f1c3a52-8d7e-4b0a-9c55-2f4e1d0b7a11";

  it("requires the owner and descriptor ids to match", () => {
    const ref = refTo(target, "1.0.0", "2.0.0");
    expect(matchesReference(ref, OWNER, target, "1.2.0")).toBe(true);
    expect(
      matchesReference(ref, OWNER, "0d9e6c1b-3f2a-4e58-8b71-5a6c4d3e2f10", "1.2.0")
    ).toBe(false);
    expect(
      matchesReference(ref, "0d9e6c1b-3f2a-4e58-8b71-5a6c4d3e2f10", target, "1.2.0")
    ).toBe(false);
  });

  it("compares ids without regard to case", () => {
    const ref = refTo(target.toUpperCase(), "1.0.0", "1.0.0", OWNER.toUpperCase());
    expect(matchesReference(ref, OWNER, target, "1.0.0")).toBe(true);
  });

  it("rejects a matching id with a version outside the window", () => {
    const ref = refTo(target, "1.0.0", "2.0.0");
    expect(matchesReference(ref, OWNER, target, "3.0.0")).toBe(false);
  });
});

describe("formatReference", () => {
  it("prints the id and the window", () => {
    const target = "6f1c3a52-8d7e-4b0a-9c55-2f4e1d0b7a11";
    expect(formatReference(refTo(target, "1.0.0", "2.0.0"))).toBe(
      "6f1c3a52-8d7e-4b0a-9c55-2f4e1d0b7a11 (version in [1.0.0, 2.0.0])"
    );
  });
});
