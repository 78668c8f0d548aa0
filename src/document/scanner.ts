/**
 * Document Token Scanner — finds every `{{...}}` occurrence in a document,
 * including tokens whose characters are split across several runs.
 *
 * Scanning is container-local: a `{{` in one paragraph never pairs with a
 * `}}` in the next. The document is only read, never written.
 */

import { dedupeTokens, parseToken, TOKEN_CLOSE, TOKEN_OPEN } from "../tokens/grammar.js";
import type { TokenExpression } from "../tokens/grammar.js";
import type { TokenParseError } from "../shared/errors.js";
import type { TextDocument } from "./types.js";

export interface SpanPosition {
  span: number;
  /** Character offset within the span's text. */
  offset: number;
}

export interface TokenLocation {
  region: number;
  container: number;
  /** First character of `{{`. */
  start: SpanPosition;
  /** Just past the last character of `}}` (exclusive). */
  end: SpanPosition;
}

export interface TokenOccurrence {
  expression: TokenExpression;
  /** Inner text exactly as written between the delimiters. */
  raw: string;
  location: TokenLocation;
}

export interface ScanParseError {
  error: TokenParseError;
  location: TokenLocation;
}

export interface ScanWarning {
  kind: "UnterminatedToken";
  message: string;
  region: number;
  container: number;
  /** Offset of the dangling `{{` in the container's concatenated text. */
  offset: number;
}

export interface ScanResult {
  occurrences: TokenOccurrence[];
  parseErrors: ScanParseError[];
  warnings: ScanWarning[];
}

/** Concatenated container text plus the start offset of every span. */
interface ContainerText {
  text: string;
  spans: readonly number[];
  starts: number[];
}

function readContainer(doc: TextDocument, container: number): ContainerText {
  const spans = doc.spans(container);
  const starts: number[] = [];
  let text = "";
  for (const span of spans) {
    starts.push(text.length);
    text += doc.spanText(span);
  }
  return { text, spans, starts };
}

/**
 * Map a character offset of the concatenated text to a span position.
 * `exclusiveEnd` attributes a boundary offset to the span that ends there.
 */
function positionAt(ct: ContainerText, offset: number, exclusiveEnd: boolean): SpanPosition {
  let i = ct.spans.length - 1;
  for (let k = 0; k < ct.spans.length; k++) {
    const start = ct.starts[k];
    const end = k + 1 < ct.spans.length ? ct.starts[k + 1] : ct.text.length;
    const inside = exclusiveEnd ? offset > start && offset <= end : offset >= start && offset < end;
    if (inside) {
      i = k;
      break;
    }
  }
  return { span: ct.spans[i], offset: offset - ct.starts[i] };
}

export function scanDocument(doc: TextDocument): ScanResult {
  const result: ScanResult = { occurrences: [], parseErrors: [], warnings: [] };

  for (let region = 0; region < doc.regionCount(); region++) {
    for (const container of doc.containers(region)) {
      scanContainer(doc, region, container, result);
    }
  }
  return result;
}

function scanContainer(doc: TextDocument, region: number, container: number, result: ScanResult): void {
  const ct = readContainer(doc, container);
  const { text } = ct;
  let from = 0;

  while (from < text.length) {
    const open = text.indexOf(TOKEN_OPEN, from);
    if (open === -1) return;

    const close = text.indexOf(TOKEN_CLOSE, open + TOKEN_OPEN.length);
    const reopen = text.indexOf(TOKEN_OPEN, open + TOKEN_OPEN.length);

    if (close === -1 || (reopen !== -1 && reopen < close)) {
      result.warnings.push({
        kind: "UnterminatedToken",
        message: `Unterminated "{{" in ${doc.region(region).part}: "${excerpt(text, open)}"`,
        region,
        container,
        offset: open,
      });
      if (close === -1 && reopen === -1) return;
      from = reopen !== -1 && (close === -1 || reopen < close) ? reopen : close + TOKEN_CLOSE.length;
      continue;
    }

    const end = close + TOKEN_CLOSE.length;
    const raw = text.slice(open + TOKEN_OPEN.length, close);
    const location: TokenLocation = {
      region,
      container,
      start: positionAt(ct, open, false),
      end: positionAt(ct, end, true),
    };

    const parsed = parseToken(raw);
    if (parsed.ok) {
      result.occurrences.push({ expression: parsed.expression, raw, location });
    } else {
      result.parseErrors.push({ error: parsed.error, location });
    }
    from = end;
  }
}

function excerpt(text: string, at: number): string {
  const s = text.slice(at, at + 30);
  return at + 30 < text.length ? `${s}…` : s;
}

/** Distinct expressions of a scan, first-occurrence order. */
export function scannedExpressions(scan: ScanResult): TokenExpression[] {
  return dedupeTokens(scan.occurrences.map((o) => o.expression));
}
