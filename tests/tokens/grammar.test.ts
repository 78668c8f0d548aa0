/**
 * Token Grammar Tests
 *
 * parseToken, serializeToken, tokenKey and dedupeTokens.
 */

import { describe, it, expect } from "vitest";
import { dedupeTokens, parseToken, serializeToken, tokenKey, tokensEqual } from "../../src/tokens/grammar.js";
import type { TokenExpression } from "../../src/tokens/grammar.js";
import { TokenParseError } from "../../src/shared/errors.js";

function parsed(raw: string): TokenExpression {
  const out = parseToken(raw);
  if (!out.ok) throw new Error(`expected "${raw}" to parse: ${out.error.message}`);
  return out.expression;
}

function errorKind(raw: string): string {
  const out = parseToken(raw);
  if (out.ok) throw new Error(`expected "${raw}" to fail`);
  return out.error.kind;
}

describe("parseToken", () => {
  it("parses a bare field name", () => {
    expect(parsed("Name")).toEqual({ fieldName: "Name", filters: [], hasDefault: false, defaultValue: "" });
  });

  it("parses filters left to right", () => {
    expect(parsed("Name|trim|upper").filters).toEqual(["trim", "upper"]);
  });

  it("parses a default after ?:", () => {
    const expr = parsed("Missing?:N/A");
    expect(expr.fieldName).toBe("Missing");
    expect(expr.hasDefault).toBe(true);
    expect(expr.defaultValue).toBe("N/A");
  });

  it("accepts an empty default", () => {
    const expr = parsed("Note?:");
    expect(expr.hasDefault).toBe(true);
    expect(expr.defaultValue).toBe("");
  });

  it("trims the field name but keeps filters and default literally", () => {
    const expr = parsed("  Amount | currency ?: 0 ");
    expect(expr.fieldName).toBe("Amount");
    expect(expr.filters).toEqual([" currency "]);
    expect(expr.defaultValue).toBe(" 0 ");
  });

  it("only the first ?: starts the default", () => {
    const expr = parsed("A|b?:x?:y");
    expect(expr.filters).toEqual(["b"]);
    expect(expr.defaultValue).toBe("x?:y");
  });

  it("accepts unknown filter names", () => {
    expect(parsed("Name|shout").filters).toEqual(["shout"]);
  });

  it("returns frozen expressions", () => {
    const expr = parsed("Name|upper");
    expect(Object.isFrozen(expr)).toBe(true);
    expect(Object.isFrozen(expr.filters)).toBe(true);
  });

  // ── Errors ──

  it("rejects an empty field name", () => {
    expect(errorKind("")).toBe("EmptyFieldName");
    expect(errorKind("   ")).toBe("EmptyFieldName");
    expect(errorKind("|upper")).toBe("EmptyFieldName");
    expect(errorKind("?:default")).toBe("EmptyFieldName");
  });

  it("rejects ? not followed by :", () => {
    expect(errorKind("Name?x")).toBe("MalformedDefault");
    expect(errorKind("Name?")).toBe("MalformedDefault");
  });

  it("rejects nested delimiters", () => {
    expect(errorKind("a{{b")).toBe("NestedDelimiter");
    expect(errorKind("a}}b")).toBe("NestedDelimiter");
  });

  it("returns TokenParseError with the raw text", () => {
    const out = parseToken("Name?x");
    expect(out.ok).toBe(false);
    if (!out.ok) {
      expect(out.error).toBeInstanceOf(TokenParseError);
      expect(out.error.raw).toBe("Name?x");
      expect(out.error.code).toBe("TOKEN_PARSE_ERROR");
    }
  });

  it("never throws", () => {
    const inputs = ["", "?", ":", "|", "||", "?:", "a|", "a||b", "{", "}", "a?:b|c", "\u0000", "é|ü?:ñ", " ? : "];
    for (const raw of inputs) {
      expect(() => parseToken(raw)).not.toThrow();
    }
  });
});

describe("serializeToken", () => {
  it("re-emits field|filters?:default", () => {
    expect(serializeToken(parsed("Name|trim|upper"))).toBe("Name|trim|upper");
    expect(serializeToken(parsed("Missing?:N/A"))).toBe("Missing?:N/A");
    expect(serializeToken(parsed(" Name "))).toBe("Name");
  });

  it("round-trips the field name", () => {
    for (const raw of ["Name", " Name |upper", "A|b?:x?:y", "Amount | currency ?: 0 ", "Ñame?:"]) {
      const first = parsed(raw);
      expect(parsed(serializeToken(first)).fieldName).toBe(first.fieldName);
    }
  });
});

describe("tokenKey / dedupeTokens", () => {
  it("treats whitespace around the field name as insignificant", () => {
    expect(tokenKey(parsed(" Name |upper"))).toBe("Name|upper");
    expect(tokensEqual(parsed(" Name |upper"), parsed("Name|upper"))).toBe(true);
  });

  it("distinguishes filters, defaults and field case", () => {
    expect(tokensEqual(parsed("Name|upper"), parsed("Name|lower"))).toBe(false);
    expect(tokensEqual(parsed("Name"), parsed("Name?:"))).toBe(false);
    expect(tokensEqual(parsed("Name"), parsed("name"))).toBe(false);
  });

  it("keeps first occurrences in order", () => {
    const exprs = ["B", "A", " B ", "A|upper", "A"].map(parsed);
    expect(dedupeTokens(exprs).map(serializeToken)).toEqual(["B", "A", "A|upper"]);
  });
});
