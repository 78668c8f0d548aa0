/**
 * Document Token Substitution Engine — writes resolved values back into a
 * scanned document.
 *
 * Every occurrence is resolved before the first write, so a strict-mode
 * failure leaves the document exactly as it was opened.
 *
 * Tokens that cross spans follow "first span absorbs, rest truncated":
 *
 *   ["Dear {{Na", "me}}", "!"]  →  ["Dear Ana", "", "!"]
 *
 * and the emptied middle/last spans are dropped when their run holds
 * nothing else.
 */

import { resolveToken, RowLookup } from "../tokens/resolver.js";
import type { ResolveOptions, RowValues } from "../tokens/resolver.js";
import type { FilterWarning } from "../tokens/filters.js";
import type { ScanResult, TokenLocation } from "./scanner.js";
import type { TextDocument } from "./types.js";

export type SubstituteOptions = ResolveOptions;

export interface CellWarning extends FilterWarning {
  field: string;
}

export interface SubstituteResult {
  replaced: number;
  warnings: CellWarning[];
}

/**
 * Substitute every occurrence of `scan` (which must come from `doc` or a
 * document opened from the same bytes). Throws ResolveError in strict mode
 * before touching the document.
 */
export function substituteDocument(
  doc: TextDocument,
  scan: ScanResult,
  row: RowValues | RowLookup,
  opts: SubstituteOptions,
): SubstituteResult {
  const lookup = row instanceof RowLookup ? row : new RowLookup(row, opts.fieldMatching);
  const values: string[] = [];
  const warnings: CellWarning[] = [];

  for (const occ of scan.occurrences) {
    const resolved = resolveToken(occ.expression, lookup, opts);
    if (!resolved.ok) throw resolved.error;
    values.push(resolved.value);
    for (const w of resolved.warnings) {
      warnings.push({ ...w, field: occ.expression.fieldName });
    }
  }

  const byContainer = new Map<number, number[]>();
  scan.occurrences.forEach((occ, i) => {
    const list = byContainer.get(occ.location.container) ?? [];
    list.push(i);
    byContainer.set(occ.location.container, list);
  });

  // Right to left, so earlier locations in the container stay valid
  for (const indices of byContainer.values()) {
    for (let k = indices.length - 1; k >= 0; k--) {
      const i = indices[k];
      replaceAt(doc, scan.occurrences[i].location, values[i]);
    }
  }

  return { replaced: scan.occurrences.length, warnings };
}

function replaceAt(doc: TextDocument, loc: TokenLocation, value: string): void {
  const { start, end } = loc;
  const firstText = doc.spanText(start.span);

  if (start.span === end.span) {
    doc.setSpanText(start.span, firstText.slice(0, start.offset) + value + firstText.slice(end.offset));
    return;
  }

  const spans = doc.spans(loc.container);
  const first = spans.indexOf(start.span);
  const last = spans.indexOf(end.span);

  doc.setSpanText(start.span, firstText.slice(0, start.offset) + value);
  for (let k = first + 1; k < last; k++) {
    doc.removeSpan(spans[k]);
  }

  const suffix = doc.spanText(end.span).slice(end.offset);
  if (suffix) {
    doc.setSpanText(end.span, suffix);
  } else {
    doc.removeSpan(end.span);
  }
}
