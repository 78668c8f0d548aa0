/**
 * Output file naming: `{Column}` and `{index}` placeholders, with an
 * optional zero-padded integer spec such as `{index:04d}`. `{{` and `}}`
 * stand for literal braces.
 */

import type { RowLookup } from "../tokens/resolver.js";

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/** Replace characters that are unsafe in file names with `_` and trim. */
export function sanitizeFilename(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, "_").trim();
}

export type NameOutcome = { ok: true; name: string } | { ok: false; error: string };

function applySpec(value: string, spec: string | undefined): string | null {
  if (spec === undefined || spec === "") return value;
  const m = /^(0?)(\d*)d$/.exec(spec);
  if (!m) return null;
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n)) return null;
  const width = m[2] ? parseInt(m[2], 10) : 0;
  const digits = String(Math.abs(n)).padStart(m[1] ? Math.max(0, width - (n < 0 ? 1 : 0)) : 0, "0");
  const signed = n < 0 ? `-${digits}` : digits;
  return signed.padStart(width, " ");
}

/** Expand a pattern for one row. `index` is the row's zero-based source position. */
export function formatOutputName(pattern: string, row: RowLookup, index: number): NameOutcome {
  let out = "";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if ((ch === "{" || ch === "}") && pattern[i + 1] === ch) {
      out += ch;
      i += 2;
      continue;
    }
    if (ch === "}") return { ok: false, error: `Unmatched "}" in filename pattern "${pattern}"` };
    if (ch !== "{") {
      out += ch;
      i++;
      continue;
    }

    const close = pattern.indexOf("}", i + 1);
    if (close === -1) return { ok: false, error: `Unmatched "{" in filename pattern "${pattern}"` };
    const inner = pattern.slice(i + 1, close);
    const colon = inner.indexOf(":");
    const key = (colon === -1 ? inner : inner.slice(0, colon)).trim();
    const spec = colon === -1 ? undefined : inner.slice(colon + 1);

    const value = key === "index" ? String(index) : row.get(key);
    if (value === undefined) {
      return { ok: false, error: `Filename pattern requires a missing column: "${key}". Pattern: ${pattern}` };
    }
    const formatted = applySpec(value, spec);
    if (formatted === null) {
      return { ok: false, error: `Cannot format "${value}" with ":${spec}" in filename pattern` };
    }
    out += formatted;
    i = close + 1;
  }

  let name = sanitizeFilename(out);
  if (!name.toLowerCase().endsWith(".pdf")) name += ".pdf";
  if (name === ".pdf") return { ok: false, error: `Filename pattern "${pattern}" produced an empty name` };
  return { ok: true, name };
}
