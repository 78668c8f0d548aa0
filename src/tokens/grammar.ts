/**
 * Token Grammar — parses the inner text of a `{{...}}` placeholder.
 *
 *   inner   := field ( '|' filter )* ( '?:' default )?
 *
 * Examples:
 *   "Name|trim|upper"   → field Name, filters [trim, upper]
 *   "Amount|currency"   → field Amount, filters [currency]
 *   "Missing?:N/A"      → field Missing, default "N/A"
 *
 * Filter names are accepted as written; unknown names surface later as
 * filter warnings at resolve time so preflight still sees the field.
 */

import { TokenParseError } from "../shared/errors.js";

export interface TokenExpression {
  readonly fieldName: string;
  readonly filters: readonly string[];
  readonly hasDefault: boolean;
  readonly defaultValue: string;
}

export type ParseOutcome =
  | { ok: true; expression: TokenExpression }
  | { ok: false; error: TokenParseError };

export const TOKEN_OPEN = "{{";
export const TOKEN_CLOSE = "}}";

/**
 * Parse a token's inner text. Never throws: malformed syntax is returned
 * as a TokenParseError.
 */
export function parseToken(raw: string): ParseOutcome {
  if (raw.includes(TOKEN_OPEN) || raw.includes(TOKEN_CLOSE)) {
    return fail("NestedDelimiter", raw, "token text may not contain '{{' or '}}'");
  }

  let head = raw;
  let hasDefault = false;
  let defaultValue = "";

  const q = raw.indexOf("?");
  if (q !== -1) {
    if (raw[q + 1] !== ":") {
      return fail("MalformedDefault", raw, "'?' must be followed by ':' to start a default");
    }
    head = raw.slice(0, q);
    hasDefault = true;
    defaultValue = raw.slice(q + 2);
  }

  const [field, ...filters] = head.split("|");
  const fieldName = field.trim();
  if (!fieldName) {
    return fail("EmptyFieldName", raw, "field name is empty");
  }

  return {
    ok: true,
    expression: Object.freeze({
      fieldName,
      filters: Object.freeze(filters),
      hasDefault,
      defaultValue,
    }),
  };
}

/** Serialized form: `field|f1|f2?:default`. */
export function serializeToken(expr: TokenExpression): string {
  const filters = expr.filters.map((f) => `|${f}`).join("");
  const fallback = expr.hasDefault ? `?:${expr.defaultValue}` : "";
  return `${expr.fieldName}${filters}${fallback}`;
}

/** Identity key: two expressions are equal iff their keys are equal. */
export function tokenKey(expr: TokenExpression): string {
  return serializeToken(expr);
}

export function tokensEqual(a: TokenExpression, b: TokenExpression): boolean {
  return tokenKey(a) === tokenKey(b);
}

/** Distinct expressions, first occurrence order. */
export function dedupeTokens(exprs: Iterable<TokenExpression>): TokenExpression[] {
  const seen = new Map<string, TokenExpression>();
  for (const expr of exprs) {
    const key = tokenKey(expr);
    if (!seen.has(key)) seen.set(key, expr);
  }
  return [...seen.values()];
}

function fail(
  kind: TokenParseError["kind"],
  raw: string,
  detail: string,
): ParseOutcome {
  return { ok: false, error: new TokenParseError(kind, raw, detail) };
}
