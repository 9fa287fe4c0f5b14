import { describe, it, expect } from "vitest";
import { booleanParam, choiceParam, optionalStringParam, stringArrayParam, stringParam, stringRecordParam } from "./params.js";

describe("step parameter accessors", () => {
  const params: Record<string, unknown> = {
    name: "demo",
    empty: "",
    flag: true,
    list: ["a", "b"],
    mixed: ["a", 1],
    tags: { env: "test" },
    count: 3,
  };

  it("reads strings", () => {
    expect(stringParam(params, "name")).toBe("demo");
    expect(() => stringParam(params, "empty")).toThrow('Step parameter "empty" must be a non-empty string (got string)');
    expect(() => stringParam(params, "count")).toThrow('Step parameter "count" must be a non-empty string (got number)');
  });

  it("treats absent and empty optional strings as undefined", () => {
    expect(optionalStringParam(params, "missing")).toBeUndefined();
    expect(optionalStringParam(params, "empty")).toBeUndefined();
    expect(() => optionalStringParam(params, "flag")).toThrow('Step parameter "flag" must be a string (got boolean)');
  });

  it("reads booleans with a fallback", () => {
    expect(booleanParam(params, "flag")).toBe(true);
    expect(booleanParam(params, "missing")).toBe(false);
    expect(booleanParam(params, "missing", true)).toBe(true);
    expect(() => booleanParam(params, "name")).toThrow('Step parameter "name" must be a boolean (got string)');
  });

  it("reads string arrays", () => {
    expect(stringArrayParam(params, "list")).toEqual(["a", "b"]);
    expect(stringArrayParam(params, "missing")).toEqual([]);
    expect(() => stringArrayParam(params, "mixed")).toThrow('Step parameter "mixed" must be an array of strings (got array)');
  });

  it("reads string records", () => {
    expect(stringRecordParam(params, "tags")).toEqual({ env: "test" });
    expect(stringRecordParam(params, "missing")).toEqual({});
    expect(() => stringRecordParam(params, "list")).toThrow('Step parameter "list" must be an object (got array)');
  });

  it("restricts choices", () => {
    expect(choiceParam(params, "name", ["demo", "prod"])).toBe("demo");
    expect(() => choiceParam(params, "name", ["admin", "portal"])).toThrow('Step parameter "name" must be one of admin, portal (got string)');
  });
});
