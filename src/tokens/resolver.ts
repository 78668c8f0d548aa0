/**
 * Value Resolver — turns a TokenExpression plus one data row into the
 * substitution string.
 *
 * The only hard failure is a missing, undefaulted field under strict mode.
 * Filter problems come back as warnings attached to a successful result.
 */

import { ResolveError } from "../shared/errors.js";
import type { TokenExpression } from "./grammar.js";
import type { FilterRegistry, FilterWarning } from "./filters.js";

/** Column name → already-stringified cell value. */
export type RowValues = Readonly<Record<string, string>>;

export type FieldMatching = "insensitive" | "sensitive";

export interface ResolveOptions {
  strict: boolean;
  registry: FilterRegistry;
  fieldMatching?: FieldMatching;
  /** Treat a present-but-blank cell as missing when the token has a default. */
  defaultOnBlank?: boolean;
}

export interface ResolvedValue {
  value: string;
  fieldPresent: boolean;
  warnings: FilterWarning[];
}

export type ResolveOutcome =
  | ({ ok: true } & ResolvedValue)
  | { ok: false; error: ResolveError };

/**
 * Case-aware view over a row. Built once per row and shared by every token
 * resolved against it.
 */
export class RowLookup {
  private readonly exact: RowValues;
  private readonly folded = new Map<string, string>();
  readonly matching: FieldMatching;

  constructor(row: RowValues, matching: FieldMatching = "insensitive") {
    this.exact = row;
    this.matching = matching;
    if (matching === "insensitive") {
      for (const [key, value] of Object.entries(row)) {
        const folded = key.toLowerCase();
        // First column wins when two headers differ only by case
        if (!this.folded.has(folded)) this.folded.set(folded, value);
      }
    }
  }

  get(field: string): string | undefined {
    if (Object.prototype.hasOwnProperty.call(this.exact, field)) return this.exact[field];
    if (this.matching === "sensitive") return undefined;
    return this.folded.get(field.toLowerCase());
  }

  has(field: string): boolean {
    return this.get(field) !== undefined;
  }
}

export function resolveToken(
  expr: TokenExpression,
  row: RowValues | RowLookup,
  opts: ResolveOptions,
): ResolveOutcome {
  const lookup = row instanceof RowLookup ? row : new RowLookup(row, opts.fieldMatching);
  const found = lookup.get(expr.fieldName);

  let base: string;
  let fieldPresent: boolean;
  if (found !== undefined && !(opts.defaultOnBlank && expr.hasDefault && found.trim() === "")) {
    base = found;
    fieldPresent = true;
  } else if (expr.hasDefault) {
    base = expr.defaultValue;
    fieldPresent = found !== undefined;
  } else {
    if (opts.strict) {
      return { ok: false, error: new ResolveError(expr.fieldName) };
    }
    base = "";
    fieldPresent = false;
  }

  const warnings: FilterWarning[] = [];
  let value = base;
  for (const name of expr.filters) {
    const outcome = opts.registry.apply(name, value);
    value = outcome.value;
    if (outcome.warning) warnings.push(outcome.warning);
  }

  return { ok: true, value, fieldPresent, warnings };
}
