/**
 * OOXML string helpers shared by the document adapters and the XLSX reader.
 *
 * Package parts are handled as raw XML text (via PizZip), the same way the
 * placeholder scanners work: tags are located with a regex walker and edits
 * are spliced back by offset, so bytes outside an edit are never reformatted.
 */

import path from "path";
import type PizZip from "pizzip";

// ── Entities ────────────────────────────────────────────────────────

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

/** Decode XML character and entity references in text content. */
export function decodeXmlText(s: string): string {
  return s.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (match, ref: string) => {
    if (ref.startsWith("#x")) return String.fromCodePoint(parseInt(ref.slice(2), 16));
    if (ref.startsWith("#")) return String.fromCodePoint(parseInt(ref.slice(1), 10));
    return NAMED_ENTITIES[ref] ?? match;
  });
}

/** Escape XML special characters for safe embedding in OOXML text nodes. */
export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Drop characters that XML 1.0 does not allow in documents. */
export function stripInvalidXmlChars(s: string): string {
  return s.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g, "");
}

// ── Tag Walker ──────────────────────────────────────────────────────

export interface XmlTag {
  /** Qualified name, e.g. "w:p". */
  name: string;
  kind: "open" | "close" | "self";
  /** Offset of `<`. */
  start: number;
  /** Offset just past `>`. */
  end: number;
  /** Raw attribute text (may end with "/" for self-closing tags). */
  attrs: string;
}

const TAG_RE = /<(\/?)([A-Za-z_][\w.-]*(?::[\w.-]+)?)((?:"[^"]*"|'[^']*'|[^'">])*)>/g;

/**
 * Yield every element tag in document order. Declarations, processing
 * instructions and comments are not matched by the name pattern.
 */
export function* walkTags(xml: string): Generator<XmlTag> {
  const re = new RegExp(TAG_RE.source, "g");
  let m: RegExpExecArray | null;
  while ((m = re.exec(xml)) !== null) {
    const closing = m[1] === "/";
    const attrs = m[3];
    const self = !closing && attrs.trimEnd().endsWith("/");
    yield {
      name: m[2],
      kind: closing ? "close" : self ? "self" : "open",
      start: m.index,
      end: m.index + m[0].length,
      attrs,
    };
  }
}

/** Read an attribute value from raw attribute text. */
export function getAttr(attrs: string, name: string): string | undefined {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const m = new RegExp(`(?:^|\\s)${escaped}\\s*=\\s*("([^"]*)"|'([^']*)')`).exec(attrs);
  if (!m) return undefined;
  return decodeXmlText(m[2] ?? m[3] ?? "");
}

// ── Edits ───────────────────────────────────────────────────────────

export interface XmlEdit {
  start: number;
  end: number;
  replacement: string;
}

/**
 * Apply non-overlapping edits to the original text, back to front so
 * earlier offsets stay valid.
 */
export function applyEdits(xml: string, edits: XmlEdit[]): string {
  const sorted = [...edits].sort((a, b) => b.start - a.start);
  let out = xml;
  let floor = Number.POSITIVE_INFINITY;
  for (const edit of sorted) {
    if (edit.end > floor) {
      throw new Error(`Overlapping XML edits at offset ${edit.start}`);
    }
    out = out.slice(0, edit.start) + edit.replacement + out.slice(edit.end);
    floor = edit.start;
  }
  return out;
}

// ── Package Parts ───────────────────────────────────────────────────

/** Trailing number of a part name: "word/header12.xml" → 12. */
function partNumber(name: string): number {
  const m = /(\d+)\.xml$/.exec(name);
  return m ? parseInt(m[1], 10) : 0;
}

/** Part names matching a pattern, ordered by their trailing number. */
export function listParts(zip: PizZip, pattern: RegExp): string[] {
  return Object.keys(zip.files)
    .filter((name) => pattern.test(name) && !zip.files[name].dir)
    .sort((a, b) => partNumber(a) - partNumber(b) || a.localeCompare(b));
}

export function readPart(zip: PizZip, name: string): string | null {
  const entry = zip.file(name);
  return entry ? entry.asText() : null;
}

/**
 * Relationships of a part: rId → absolute part name inside the package.
 * External targets are left out.
 */
export function readRelationships(zip: PizZip, partName: string): Map<string, string> {
  const dir = path.posix.dirname(partName);
  const relsName = path.posix.join(dir, "_rels", `${path.posix.basename(partName)}.rels`);
  const xml = readPart(zip, relsName);
  const rels = new Map<string, string>();
  if (!xml) return rels;

  for (const tag of walkTags(xml)) {
    if (tag.name !== "Relationship" || tag.kind === "close") continue;
    const id = getAttr(tag.attrs, "Id");
    const target = getAttr(tag.attrs, "Target");
    if (!id || !target || getAttr(tag.attrs, "TargetMode") === "External") continue;
    const resolved = target.startsWith("/")
      ? target.slice(1)
      : path.posix.normalize(path.posix.join(dir, target));
    rels.set(id, resolved);
  }
  return rels;
}
