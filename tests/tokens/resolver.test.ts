/**
 * Value Resolver Tests
 */

import { describe, it, expect } from "vitest";
import { parseToken } from "../../src/tokens/grammar.js";
import type { TokenExpression } from "../../src/tokens/grammar.js";
import { FilterRegistry } from "../../src/tokens/filters.js";
import { resolveToken, RowLookup } from "../../src/tokens/resolver.js";
import type { ResolveOptions, RowValues } from "../../src/tokens/resolver.js";
import { ResolveError } from "../../src/shared/errors.js";

const registry = new FilterRegistry();
const lenient: ResolveOptions = { strict: false, registry };

function expr(raw: string): TokenExpression {
  const out = parseToken(raw);
  if (!out.ok) throw out.error;
  return out.expression;
}

function value(raw: string, row: RowValues, opts: ResolveOptions = lenient): string {
  const out = resolveToken(expr(raw), row, opts);
  if (!out.ok) throw out.error;
  return out.value;
}

describe("resolveToken", () => {
  it("applies filters to a present value", () => {
    expect(value("Name|trim|upper", { Name: "  ana  " })).toBe("ANA");
    expect(value("Amount|currency", { Amount: "1234.5" })).toBe("1,234.50");
  });

  it("uses the default for an absent field", () => {
    const out = resolveToken(expr("Missing?:N/A"), {}, lenient);
    expect(out).toEqual({ ok: true, value: "N/A", fieldPresent: false, warnings: [] });
  });

  it("runs filters on the default", () => {
    expect(value("Missing|upper?:n/a", {})).toBe("N/A");
  });

  it("resolves an absent undefaulted field to empty when not strict", () => {
    const out = resolveToken(expr("Missing"), { Other: "x" }, lenient);
    expect(out).toEqual({ ok: true, value: "", fieldPresent: false, warnings: [] });
  });

  it("fails an absent undefaulted field in strict mode", () => {
    const out = resolveToken(expr("Missing|upper"), {}, { strict: true, registry });
    expect(out.ok).toBe(false);
    if (!out.ok) {
      expect(out.error).toBeInstanceOf(ResolveError);
      expect(out.error.kind).toBe("MissingRequiredField");
      expect(out.error.field).toBe("Missing");
    }
  });

  it("does not fail in strict mode when a default exists", () => {
    expect(value("Missing?:x", {}, { strict: true, registry })).toBe("x");
  });

  it("keeps a present blank value unless defaultOnBlank is set", () => {
    expect(value("Note?:none", { Note: "" })).toBe("");
    const out = resolveToken(expr("Note?:none"), { Note: " " }, { ...lenient, defaultOnBlank: true });
    expect(out).toEqual({ ok: true, value: "none", fieldPresent: true, warnings: [] });
  });

  it("matches field names case-insensitively by default", () => {
    expect(value("NAME", { name: "ana" })).toBe("ana");
    expect(value("NAME?:-", { name: "ana" }, { ...lenient, fieldMatching: "sensitive" })).toBe("-");
  });

  it("collects filter warnings in order", () => {
    const out = resolveToken(expr("Amount|currency|bogus"), { Amount: "abc" }, lenient);
    expect(out.ok).toBe(true);
    if (out.ok) {
      expect(out.value).toBe("abc");
      expect(out.warnings.map((w) => w.kind)).toEqual(["UnparseableInput", "UnknownFilter"]);
    }
  });
});

describe("RowLookup", () => {
  it("prefers an exact match, then the first case-folded column", () => {
    const lookup = new RowLookup({ Name: "a", NAME: "b" });
    expect(lookup.get("NAME")).toBe("b");
    expect(lookup.get("name")).toBe("a");
    expect(lookup.has("nAmE")).toBe(true);
    expect(lookup.has("Other")).toBe(false);
  });

  it("can be shared across tokens of one row", () => {
    const lookup = new RowLookup({ City: "Lyon" });
    const out = resolveToken(expr("city|upper"), lookup, lenient);
    expect(out.ok && out.value).toBe("LYON");
  });
});
