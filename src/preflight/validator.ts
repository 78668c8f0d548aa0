/**
 * Preflight Validator — compares the tokens of every template a batch will
 * use against the columns the data source provides, before any row runs.
 *
 *   missingColumns  fields no column matches (fields that have a default
 *                   somewhere are excluded)
 *   unusedColumns   columns no field references (control columns excluded)
 *
 * The two lists are always disjoint: a column is "unused" only if no field
 * matches it, and a field is "missing" only if no column matches it.
 */

import type { TokenExpression } from "../tokens/grammar.js";
import type { FieldMatching } from "../tokens/resolver.js";
import type { ScanParseError, ScanResult, ScanWarning } from "../document/scanner.js";

/** Control columns read by the orchestrator; never reported as unused. */
export const RESERVED_COLUMNS = ["TEMPLATE", "SKIP", "OUTPUT"] as const;

export interface TemplateTokens {
  template: string;
  expressions: TokenExpression[];
  parseErrors: ScanParseError[];
  warnings: ScanWarning[];
}

export interface PreflightOptions {
  fieldMatching?: FieldMatching;
  reservedColumns?: readonly string[];
}

export interface PreflightResult {
  missingColumns: string[];
  unusedColumns: string[];
  perTemplateTokens: Record<string, TokenExpression[]>;
  parseErrors: { template: string; raw: string; message: string }[];
  warnings: string[];
}

/** Reduce a scan to the per-template shape preflight consumes. */
export function templateTokens(template: string, scan: ScanResult): TemplateTokens {
  return {
    template,
    expressions: scan.occurrences.map((o) => o.expression),
    parseErrors: scan.parseErrors,
    warnings: scan.warnings,
  };
}

export function validatePreflight(
  templates: readonly TemplateTokens[],
  availableColumns: readonly string[],
  opts: PreflightOptions = {},
): PreflightResult {
  const matching = opts.fieldMatching ?? "insensitive";
  const fold = (s: string) => (matching === "insensitive" ? s.toLowerCase() : s);
  const reserved = new Set((opts.reservedColumns ?? RESERVED_COLUMNS).map((c) => c.toLowerCase()));

  const columnKeys = new Set(availableColumns.map(fold));
  const fields = new Set<string>();
  const defaulted = new Set<string>();
  const perTemplateTokens: Record<string, TokenExpression[]> = {};
  const parseErrors: PreflightResult["parseErrors"] = [];
  const warnings: string[] = [];

  for (const t of templates) {
    perTemplateTokens[t.template] = t.expressions;
    for (const expr of t.expressions) {
      fields.add(expr.fieldName);
      if (expr.hasDefault) defaulted.add(expr.fieldName);
    }
    for (const pe of t.parseErrors) {
      parseErrors.push({ template: t.template, raw: pe.error.raw, message: pe.error.message });
    }
    for (const w of t.warnings) {
      warnings.push(`${t.template}: ${w.message}`);
    }
  }

  const missingColumns = [...fields]
    .filter((f) => !defaulted.has(f) && !columnKeys.has(fold(f)))
    .sort();

  const referenced = new Set([...fields].map(fold));
  const unusedColumns = availableColumns
    .filter((c) => !reserved.has(c.toLowerCase()) && !referenced.has(fold(c)))
    .sort();

  return { missingColumns, unusedColumns, perTemplateTokens, parseErrors, warnings };
}
