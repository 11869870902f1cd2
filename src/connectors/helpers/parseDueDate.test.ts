import { describe, expect, it } from "vitest";

import { asList } from "./asList";
import { parseDueDate } from "./parseDueDate";

describe("parseDueDate", () => {
  it("reads a timestamp without offset as UTC", () => {
    expect(parseDueDate("2026-01-01T01:00:00")?.toISOString()).toBe(
      "2026-01-01T01:00:00.000Z",
    );
  });

  it("applies an explicit offset", () => {
    expect(parseDueDate("2026-01-01T01:00:00-03:00")?.toISOString()).toBe(
      "2026-01-01T04:00:00.000Z",
    );
    expect(parseDueDate("2026-01-01T01:00:00+0300")?.toISOString()).toBe(
      "2025-12-31T22:00:00.000Z",
    );
  });

  it("accepts a space separator and a date alone", () => {
    expect(parseDueDate("2026-01-01 08:30:00")?.toISOString()).toBe(
      "2026-01-01T08:30:00.000Z",
    );
    expect(parseDueDate("2026-01-01")?.toISOString()).toBe(
      "2026-01-01T00:00:00.000Z",
    );
  });

  it("returns undefined for missing or unparseable values", () => {
    expect(parseDueDate(undefined)).toBeUndefined();
    expect(parseDueDate("")).toBeUndefined();
    expect(parseDueDate("tomorrow")).toBeUndefined();
    expect(parseDueDate("2026-13-01")).toBeUndefined();
  });
});

describe("asList", () => {
  it("normalizes absent, empty, single and repeated values", () => {
    expect(asList(undefined)).toEqual([]);
    expect(asList("")).toEqual([]);
    expect(asList("a")).toEqual(["a"]);
    expect(asList({ Id: "1" })).toEqual([{ Id: "1" }]);
    expect(asList(["a", "b"])).toEqual(["a", "b"]);
  });
});
