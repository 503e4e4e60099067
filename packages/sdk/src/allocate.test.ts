import { describe, it, expect } from "vitest";
import { allocateSlots, normalizeIndices } from "./allocate.js";
import { InsufficientChunksError, PartLimitExceededError } from "./errors.js";

function chunks(count: number): Array<Record<string, string>> {
  return Array.from({ length: count }, (_, i) => ({ [`k${i}`]: String(i) }));
}

describe("normalizeIndices", () => {
  it("should sort and deduplicate", () => {
    expect(normalizeIndices([2, 0, 2, 1])).toEqual([0, 1, 2]);
  });
});

describe("allocateSlots", () => {
  it("should start at the base record when nothing exists", () => {
    const plan = allocateSlots("app", [], chunks(2));

    expect(plan.map((p) => [p.index, p.name])).toEqual([
      [0, "app"],
      [1, "app-1"],
    ]);
  });

  it("should reuse existing slots and extend past the highest", () => {
    const plan = allocateSlots("app", [1, 0], chunks(3));

    expect(plan.map((p) => p.name)).toEqual(["app", "app-1", "app-2"]);
  });

  it("should keep gaps in the existing numbering", () => {
    const plan = allocateSlots("app", [0, 3], chunks(3));

    expect(plan.map((p) => p.index)).toEqual([0, 3, 4]);
  });

  it("should assign chunks to slots positionally", () => {
    const plan = allocateSlots("app", [0, 1], [{ a: "1" }, { b: "2" }], { indent: 0 });

    expect(plan).toEqual([
      { index: 0, name: "app", chunk: { a: "1" }, payload: '{"a":"1"}' },
      { index: 1, name: "app-1", chunk: { b: "2" }, payload: '{"b":"2"}' },
    ]);
  });

  it("should refuse to leave existing parts unwritten", () => {
    expect(() => allocateSlots("app", [0, 1], chunks(1))).toThrow(InsufficientChunksError);
  });

  it("should allow new indices up to the overflow limit", () => {
    const plan = allocateSlots("app", [0], chunks(6), { maxOverflowParts: 5 });

    expect(plan.map((p) => p.index)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("should reject new indices past the overflow limit", () => {
    expect(() => allocateSlots("app", [0], chunks(7), { maxOverflowParts: 5 })).toThrow(
      PartLimitExceededError
    );
    expect(() => allocateSlots("app", [0], chunks(7), { maxOverflowParts: 5 })).toThrow(
      "Part index 6 exceeds the overflow part limit (5)"
    );
  });

  it("should keep reusing existing slots above the limit", () => {
    const plan = allocateSlots("app", [0, 7], chunks(2), { maxOverflowParts: 5 });

    expect(plan.map((p) => p.index)).toEqual([0, 7]);
  });
});
