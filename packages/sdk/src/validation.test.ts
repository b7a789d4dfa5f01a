import { describe, it, expect } from "vitest";
import { validateKey, validateTableName, validateValue } from "./validation.js";
import { KeyTypeError, TableNameError, ValueTypeError } from "./errors.js";

describe("validateTableName", () => {
  it.each(["orders", "Orders2", "user_sessions", "a"])("should accept %s", (name) => {
    expect(() => validateTableName(name)).not.toThrow();
  });

  it.each(["1bad", "bad name", "_private", "", "bad-name", "dots.json"])(
    "should reject %j",
    (name) => {
      expect(() => validateTableName(name)).toThrow(TableNameError);
    }
  );

  it("should explain the syntax rule", () => {
    expect(() => validateTableName("1bad")).toThrow(
      'Invalid table name "1bad": must start with a letter and contain only letters, numbers and underscores'
    );
  });

  it("should reject the metadata table name as reserved", () => {
    expect(() => validateTableName("_table_info")).toThrow(
      'Invalid table name "_table_info": name is reserved for table metadata'
    );
  });

  it("should reject non-string names", () => {
    expect(() => validateTableName(42)).toThrow(
      "Invalid table name number: table name must be a string"
    );
  });
});

describe("validateKey", () => {
  it("should accept a non-empty string", () => {
    expect(() => validateKey("user-1")).not.toThrow();
  });

  it("should reject an empty string", () => {
    expect(() => validateKey("")).toThrow('Key must be a non-empty string, got ""');
  });

  it.each([42, null, undefined, ["a"], { key: "a" }])("should reject %j", (key) => {
    expect(() => validateKey(key)).toThrow(KeyTypeError);
  });

  it("should describe the offending type", () => {
    expect(() => validateKey(7)).toThrow("Key must be a non-empty string, got number");
  });
});

describe("validateValue", () => {
  it("should accept a value with a data mapping", () => {
    expect(() => validateValue({ data: { total: 42 } })).not.toThrow();
    expect(() => validateValue({ data: {}, created_at: 1, updated_at: 2 })).not.toThrow();
  });

  it("should reject a missing data field", () => {
    expect(() => validateValue({})).toThrow(
      "Invalid store value: value is missing required property: data"
    );
  });

  it("should reject data that is not a mapping", () => {
    expect(() => validateValue({ data: "text" })).toThrow(
      "Invalid store value: value/data must be object"
    );
    expect(() => validateValue({ data: [1, 2] })).toThrow(ValueTypeError);
  });

  it("should reject a value that is not an object", () => {
    expect(() => validateValue(null)).toThrow("Invalid store value: value must be object");
  });

  it("should reject non-numeric timestamps", () => {
    const error = (() => {
      try {
        validateValue({ data: {}, created_at: "yesterday" });
        return null;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(ValueTypeError);
    expect(error).toMatchObject({
      code: "E_VALUE_TYPE",
      problems: ["value/created_at must be number"],
    });
  });
});

describe("validateValue JSON data", () => {
  const problemsOf = (value: unknown): string[] => {
    try {
      validateValue(value);
      return [];
    } catch (err) {
      return err instanceof ValueTypeError ? err.problems : ["not a ValueTypeError"];
    }
  };

  it("should accept nested JSON data", () => {
    expect(() =>
      validateValue({ data: { items: [1, "two", { three: true }], none: null, n: -0.5 } })
    ).not.toThrow();
  });

  it("should accept the same object at two places", () => {
    const shared = { id: 1 };
    expect(() => validateValue({ data: { a: shared, b: [shared] } })).not.toThrow();
  });

  it("should reject a Date", () => {
    expect(() => validateValue({ data: { when: new Date(0) } })).toThrow(
      "Invalid store value: value/data/when must be a plain object, got Date"
    );
  });

  it("should reject a Date as the data itself", () => {
    expect(problemsOf({ data: new Date(0) })).toEqual([
      "value/data must be a plain object, got Date",
    ]);
  });

  it("should reject a Map", () => {
    expect(problemsOf({ data: { index: new Map() } })).toEqual([
      "value/data/index must be a plain object, got Map",
    ]);
  });

  it("should reject NaN and Infinity", () => {
    expect(problemsOf({ data: { a: Number.NaN, b: [Infinity] } })).toEqual([
      "value/data/a must be a finite number",
      "value/data/b/0 must be a finite number",
    ]);
  });

  it("should reject undefined fields", () => {
    expect(problemsOf({ data: { gone: undefined } })).toEqual([
      "value/data/gone must not be undefined",
    ]);
  });

  it("should reject a BigInt", () => {
    expect(problemsOf({ data: { big: BigInt(1) } })).toEqual([
      "value/data/big must be JSON data, got bigint",
    ]);
  });

  it("should reject a function", () => {
    expect(problemsOf({ data: { fn: () => 1 } })).toEqual([
      "value/data/fn must be JSON data, got function",
    ]);
  });

  it("should reject a circular reference", () => {
    const data: Record<string, unknown> = { name: "loop" };
    data.self = data;
    expect(problemsOf({ data })).toEqual(["value/data/self is a circular reference"]);
  });
});
