import { describe, it, expect } from "vitest";
import {
  compileKeyGenerator,
  validateDelimiters,
  KeyGenerator,
  MAX_KEY_SIZE,
} from "./keygen.js";
import {
  DelimiterError,
  EmptyExpressionError,
  ExpressionError,
  FieldPathError,
  ResultError,
} from "./errors.js";
import type { DocumentLookup } from "./types.js";

const F = "%";
const G = "#";

const doc = Buffer.from(
  JSON.stringify({
    stringvalue: "value",
    emptystring: "",
    intvalue: 10,
    boolvalue: true,
    floatvalue: 3.1415,
    nested1: { nested2: { nested3: "nestedvalue" } },
    nested: { nested: "nestedvalue" },
    nestedempty: { nested: {} },
    "field.with.dot.": 1,
    "backtick`": 2,
    "100%": 100,
    "#hello": "world",
    "`nestedbacktick": { "a`b": 3 },
    ".nestedHidden": { nested2: { nested3: 4 } },
    array: ["one", "two", "three"],
    "`.key": "backtick1",
    "`.key.`": "backtick2",
    nullvalue: null,
    too_long: " ".repeat(MAX_KEY_SIZE + 1),
    unicode: "héllo",
  })
);

function compile(expression: string): KeyGenerator {
  return compileKeyGenerator(expression, F, G);
}

function keyOf(expression: string): string {
  return compile(expression).nextString(doc);
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

function compileError(expression: string): unknown {
  return caught(() => compile(expression));
}

describe("compileKeyGenerator", () => {
  it("should return identical text on every call for text-only expressions", () => {
    const gen = compile("textonly");
    for (let i = 0; i < 10; i++) {
      expect(gen.next(doc)).toEqual(Buffer.from("textonly"));
    }
  });

  it("should reject an empty expression", () => {
    const err = compileError("");
    expect(err).toBeInstanceOf(EmptyExpressionError);
    expect(err).toBeInstanceOf(ExpressionError);
    expect(err).toHaveProperty("message", "key generator contains an empty expression");
  });

  it("should use % and # by default", () => {
    const gen = compileKeyGenerator("%stringvalue%-#MONO_INCR#");
    expect(gen.nextString(doc)).toBe("value-1");
  });

  it("should count generators in expression order", () => {
    const gen = compile("a::%stringvalue%::#UUID#");
    expect(gen.size).toBe(4);
    expect(gen.fieldPaths()).toEqual([["stringvalue"]]);
  });

  it("should keep the compiled expression", () => {
    expect(compile("a::%stringvalue%").expression).toBe("a::%stringvalue%");
  });

  it("should give distinct keys to ids beyond 2^53", () => {
    const gen = compile("doc::%id%");
    expect(gen.nextString('{"id": 9007199254740993}')).toBe("doc::9007199254740993");
    expect(gen.nextString('{"id": 9007199254740992}')).toBe("doc::9007199254740992");
  });

    it("should use a custom lookup when provided", () => {
    const seen: string[][] = [];
    const lookup: DocumentLookup = (_document, path) => {
      seen.push([...path]);
      return { kind: "scalar", value: "custom" };
    };

    const gen = compileKeyGenerator("k::%a.b%", F, G, { lookup });
    expect(gen.nextString("not json")).toBe("k::custom");
    expect(seen).toEqual([["a", "b"]]);
  });
});

describe("MONO_INCR", () => {
  const cases: Array<{ expr: string; offset: number }> = [
    { expr: "#MONO_INCR#", offset: 1 },
    { expr: "#MONO_INCR[128]#", offset: 128 },
    { expr: "#MONO_INCR[0]#", offset: 1 },
    { expr: "#MONO_INCR[1]#", offset: 1 },
    { expr: "#MONO_INCR[-5]#", offset: 1 },
  ];

  for (const { expr, offset } of cases) {
    it(`${expr} should start at ${offset} and increment by one`, () => {
      const gen = compile(expr);
      for (let i = 0; i < 10; i++) {
        expect(gen.nextString(doc)).toBe(String(i + offset));
      }
    });
  }

  it("should keep counting when surrounded by text", () => {
    const before = compile("before#MONO_INCR#");
    expect(before.nextString(doc)).toBe("before1");
    expect(before.nextString(doc)).toBe("before2");

    const after = compile("#MONO_INCR#after");
    expect(after.nextString(doc)).toBe("1after");
    expect(after.nextString(doc)).toBe("2after");

    const both = compile("before#MONO_INCR#after");
    expect(both.nextString(doc)).toBe("before1after");
    expect(both.nextString(doc)).toBe("before2after");
  });

  it("should keep distinct keys past 2^53", () => {
    const gen = compile("#MONO_INCR[9007199254740991]#");
    expect(gen.nextString(doc)).toBe("9007199254740991");
    expect(gen.nextString(doc)).toBe("9007199254740992");
    expect(gen.nextString(doc)).toBe("9007199254740993");
  });

  it("should accept the largest unsigned 64-bit start", () => {
    const gen = compile("#MONO_INCR[18446744073709551615]#");
    expect(gen.nextString(doc)).toBe("18446744073709551615");
    expect(gen.nextString(doc)).toBe("18446744073709551616");
  });

  it("should give separate pipelines separate counters", () => {
    const a = compile("#MONO_INCR#");
    const b = compile("#MONO_INCR#");
    expect(a.nextString(doc)).toBe("1");
    expect(a.nextString(doc)).toBe("2");
    expect(b.nextString(doc)).toBe("1");
  });

  it("should advance even when a later field fails", () => {
    let calls = 0;
    const lookup: DocumentLookup = () =>
      ++calls === 1 ? { kind: "absent" } : { kind: "scalar", value: "v" };

    const gen = compileKeyGenerator("#MONO_INCR#-%f%", F, G, { lookup });
    expect(() => gen.next(doc)).toThrow(ResultError);
    expect(gen.nextString(doc)).toBe("2-v");
  });
});

describe("UUID", () => {
  it("should return a unique 36 character key on every call", () => {
    const gen = compile("#UUID#");
    const keys = new Set<string>();

    for (let i = 0; i < 10; i++) {
      const key = gen.next(doc);
      expect(key).toHaveLength(36);
      expect(key.toString()).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );
      keys.add(key.toString());
    }

    expect(keys.size).toBe(10);
  });
});

describe("expression errors", () => {
  const cases: Array<{ expr: string; message: string }> = [
    { expr: "#MONO_INCR", message: "error in key expression at char 10, unclosed generator at end of expression" },
    { expr: "%field", message: "error in key expression at char 6, unclosed field at end of expression" },
    {
      expr: "#MONO_INCR%field%#",
      message: "error in key expression at char 10, attempting to start a field inside a generator",
    },
    {
      expr: "#MONO_INCR%",
      message: "error in key expression at char 10, attempting to start a field inside a generator",
    },
    { expr: "#INVALID#", message: "error in key expression at char 1, invalid generator" },
    { expr: "ab#uuid#", message: "error in key expression at char 3, invalid generator" },
    { expr: "text#MONO_INCR#text%", message: "error in key expression at char 20, start of field at end of expression" },
    { expr: "text#MONO_INCR#%", message: "error in key expression at char 16, start of field at end of expression" },
    { expr: "text%MONO_INCR%%", message: "error in key expression at char 16, unclosed field at end of expression" },
    {
      expr: "text#MONO_INCR#text#",
      message: "error in key expression at char 20, start of generator at end of expression",
    },
    { expr: "text%field1%#", message: "error in key expression at char 13, start of generator at end of expression" },
    {
      expr: "text#MONO_INCR##",
      message: "error in key expression at char 16, start of generator at end of expression",
    },
    {
      expr: "#MONO_INCR[99999999999999999999]#",
      message: "error in key expression at char 1, invalid MONO_INCR start point '99999999999999999999'",
    },
  ];

  for (const { expr, message } of cases) {
    it(`should reject "${expr}"`, () => {
      const err = compileError(expr);
      expect(err).toBeInstanceOf(ExpressionError);
      expect(err).toHaveProperty("message", message);
    });
  }

  it("should expose the index and reason", () => {
    const err = compileError("#MONO_INCR");
    expect(err).toHaveProperty("index", 10);
    expect(err).toHaveProperty("reason", "unclosed generator at end of expression");
    expect(err).toHaveProperty("code", "E_EXPRESSION");
  });

  it("should surface field path errors unchanged", () => {
    for (const expr of ["%backtick`%", "%back`tick%", "%.field%", "%a..b%", "%field`te%"]) {
      expect(compileError(expr)).toBeInstanceOf(FieldPathError);
    }
  });
});

describe("field references", () => {
  it("should stringify scalars", () => {
    const cases: Array<[string, string]> = [
      ["%stringvalue%::#MONO_INCR#", "value::1"],
      ["%intvalue%::#MONO_INCR#", "10::1"],
      ["%boolvalue%::#MONO_INCR#", "true::1"],
      ["%floatvalue%::#MONO_INCR#", "3.1415::1"],
    ];
    for (const [expr, key] of cases) {
      expect(keyOf(expr)).toBe(key);
    }
  });

  it("should repeat the field value with an advancing counter", () => {
    const gen = compile("%stringvalue%::#MONO_INCR#");
    for (let i = 0; i < 10; i++) {
      expect(gen.nextString(doc)).toBe(`value::${i + 1}`);
    }
  });

  it("should resolve nested fields", () => {
    expect(keyOf("%nested.nested%")).toBe("nestedvalue");
    expect(keyOf("%nested1.nested2.nested3%")).toBe("nestedvalue");
  });

  it("should resolve quoted and escaped field names", () => {
    expect(keyOf("%`field.with.dot.`%")).toBe("1");
    expect(keyOf("%backtick``%")).toBe("2");
    expect(keyOf("%``nestedbacktick.a``b%")).toBe("3");
    expect(keyOf("%`.nestedHidden`.nested2.nested3%")).toBe("4");
    expect(keyOf("%```.key`%")).toBe("backtick1");
    expect(keyOf("%```.key.```%")).toBe("backtick2");
  });

  it("should allow the generator delimiter inside a field", () => {
    expect(keyOf("%#hello%")).toBe("world");
  });

  it("should measure the key limit in bytes", () => {
    expect(compile("%unicode%").next(doc)).toHaveLength(6);
  });
});

describe("result errors", () => {
  function resultError(expression: string): unknown {
    return caught(() => compile(expression).next(doc));
  }

  const cases: Array<[string, string]> = [
    ["%nullvalue%", "resulting field is null"],
    ["%emptystring%", "generated key is an empty string"],
    ["%too_long%", "generated key is larger than 250 bytes"],
    ["%non-existent%::#MONO_INCR#", "resulting field does not exist"],
    ["%nestedempty.nested%", "resulting field is a JSON array/object"],
    ["%array%", "resulting field is a JSON array/object"],
    ["%nested.nothere%", "resulting field does not exist"],
  ];

  for (const [expr, reason] of cases) {
    it(`should fail "${expr}" with "${reason}"`, () => {
      const err = resultError(expr);
      expect(err).toBeInstanceOf(ResultError);
      expect(err).toHaveProperty("reason", reason);
      expect(err).toHaveProperty("message", `key generation for document failed, ${reason}`);
    });
  }

  it("should keep failing for every document when a field is missing", () => {
    const gen = compile("%non-existent%::#MONO_INCR#");
    for (let i = 0; i < 10; i++) {
      expect(() => gen.next(doc)).toThrow(ResultError);
    }
  });

  it("should accept an empty field value when other text is present", () => {
    expect(keyOf("key-%emptystring%")).toBe("key-");
  });

  it("should accept a key of exactly 250 bytes", () => {
    const gen = compile("x".repeat(MAX_KEY_SIZE));
    expect(gen.next(doc)).toHaveLength(MAX_KEY_SIZE);
    expect(() => compile("x".repeat(MAX_KEY_SIZE + 1)).next(doc)).toThrow(ResultError);
  });
});

describe("escaping", () => {
  it("should unescape doubled generator delimiters around a generator", () => {
    expect(keyOf("##pound###MONO_INCR###sign##")).toBe("#pound#1#sign#");
  });

  it("should unescape doubled generator delimiters around a field", () => {
    expect(keyOf("##pound##%stringvalue%##")).toBe("#pound#value#");
  });

  it("should unescape doubled field delimiters in text", () => {
    expect(keyOf("%%percentage%%sign%%")).toBe("%percentage%sign%");
  });

  it("should unescape doubled field delimiters inside a field", () => {
    expect(keyOf("%%percentagesign%%%100%%%")).toBe("%percentagesign%100");
  });

  it("should treat a doubled delimiter before the closing one as part of the field name", () => {
    const err = caught(() => compile("%%pound%%%stringvalue%%%").next(doc));
    expect(err).toBeInstanceOf(ResultError);
    expect(err).toHaveProperty("reason", "resulting field does not exist");

    const gen = compile("%%pound%%%stringvalue%%%");
    expect(gen.fieldPaths()).toEqual([["stringvalue%"]]);
  });
});

describe("custom delimiters", () => {
  const cases: Array<[string, string]> = [
    [";MONO_INCR;", "1"],
    ["?stringvalue?", "value"],
    ["?stringvalue?::;MONO_INCR;", "value::1"],
    ["a??b;;", "a?b;"],
    ["#MONO_INCR#", "#MONO_INCR#"],
  ];

  for (const [expr, key] of cases) {
    it(`should generate "${key}" from "${expr}"`, () => {
      const gen = compileKeyGenerator(expr, "?", ";");
      expect(gen.nextString(doc)).toBe(key);
    });
  }
});

describe("validateDelimiters", () => {
  const cases: Array<{ name: string; f: string; g: string; message: string }> = [
    { name: "field delimiter empty", f: "", g: G, message: "field delimiter can not be the empty string" },
    { name: "generator delimiter empty", f: F, g: "", message: "generator delimiter can not be the empty string" },
    { name: "field delimiter too long", f: "%%", g: G, message: "field delimiter must be a single character" },
    {
      name: "generator delimiter too long",
      f: F,
      g: "##",
      message: "generator delimiter must be a single character",
    },
    { name: "field delimiter period", f: ".", g: G, message: "cannot use . as a field or generator delimiter" },
    { name: "generator delimiter period", f: F, g: ".", message: "cannot use . as a field or generator delimiter" },
    { name: "field delimiter backtick", f: "`", g: G, message: "cannot use ` as a field or generator delimiter" },
    { name: "generator delimiter backtick", f: F, g: "`", message: "cannot use ` as a field or generator delimiter" },
    {
      name: "equal delimiters",
      f: "-",
      g: "-",
      message: "field delimiter and generator delimiter can not be the same",
    },
  ];

  for (const { name, f, g, message } of cases) {
    it(`should reject ${name}`, () => {
      const err = caught(() => validateDelimiters(f, g));
      expect(err).toBeInstanceOf(DelimiterError);
      expect(err).toHaveProperty("message", message);
    });

    it(`should reject ${name} before scanning the expression`, () => {
      expect(() => compileKeyGenerator("", f, g)).toThrow(DelimiterError);
    });
  }

  it("should report the first violated rule", () => {
    expect(() => validateDelimiters(".", ".")).toThrow("cannot use . as a field or generator delimiter");
    expect(() => validateDelimiters("", ".")).toThrow("field delimiter can not be the empty string");
  });

  it("should accept distinct delimiters", () => {
    expect(() => validateDelimiters(F, G)).not.toThrow();
    expect(() => validateDelimiters("?", ";")).not.toThrow();
  });
});
