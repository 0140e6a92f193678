import { describe, it, expect } from "vitest";
import { isNull, readField } from "../src/core/NullPredicate.js";

describe("isNull", () => {
  const record: Record<string, unknown> = {
    missing: undefined,
    nil: null,
    no: false,
    zero: 0,
    empty: "",
    emptyList: [],
    emptyMap: {},
    yes: true,
    text: "x",
    list: ["a"],
    map: { a: 1 },
  };

  it.each(["absentKey", "missing", "nil", "no", "zero", "empty", "emptyList", "emptyMap"])(
    "treats %s as null",
    (key) => {
      expect(isNull(record, key)).toBe(true);
    },
  );

  it.each(["yes", "text", "list", "map"])("treats %s as populated", (key) => {
    expect(isNull(record, key)).toBe(false);
  });
});

describe("readField", () => {
  it("tells a missing key from an empty value", () => {
    const vo: { ParentVO?: { Name: string } | null; Contacts?: string[] } = {
      ParentVO: null,
    };
    expect(readField(vo, "Contacts")).toEqual({ kind: "absent" });
    expect(readField(vo, "ParentVO")).toEqual({ kind: "null" });
  });

  it("returns the value when populated", () => {
    const vo = { Name: "ExampleVO" };
    expect(readField(vo, "Name")).toEqual({ kind: "present", value: "ExampleVO" });
  });

  it("ignores inherited keys", () => {
    const vo: Record<string, unknown> = {};
    expect(readField(vo, "toString")).toEqual({ kind: "absent" });
  });
});
