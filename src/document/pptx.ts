/**
 * Presentation adapter: exposes a .pptx package as a TextDocument.
 *
 * Traversal order: slides in presentation order (each followed by its
 * notes slide), then slide masters, then slide layouts. Within a part,
 * shapes, tables and group members come in document order.
 */

import path from "path";
import type PizZip from "pizzip";
import { escapeXml, getAttr, listParts, readPart, readRelationships, stripInvalidXmlChars, walkTags } from "../shared/xml.js";
import { PackageDocument } from "./package_document.js";
import type { Dialect } from "./package_document.js";
import type { OpenOptions, RegionKind, TextDocument } from "./types.js";

export const PRESENTATION_PART = "ppt/presentation.xml";

/**
 * Newlines end the run and continue after an `<a:br>`, both carrying the
 * run's properties. Text outside a run (fields) keeps newlines literally.
 */
function encodeDrawingText(text: string, runProps: string | null): string {
  const clean = stripInvalidXmlChars(text);
  if (runProps === null) return `<a:t>${escapeXml(clean)}</a:t>`;
  const lineBreak = runProps ? `<a:br>${runProps}</a:br>` : "<a:br/>";
  return clean
    .split(/\r\n|\r|\n/)
    .map((line) => `<a:t>${escapeXml(line)}</a:t>`)
    .join(`</a:r>${lineBreak}<a:r>${runProps}`);
}

export const DRAWING_DIALECT: Dialect = {
  paragraph: "a:p",
  run: "a:r",
  text: "a:t",
  table: "a:tbl",
  runProps: "a:rPr",
  encodeText: encodeDrawingText,
};

/**
 * Parts referenced from presentation.xml by `<p:{idTag} r:id="…">`, in list
 * order. Falls back to numbered part names when the list is absent.
 */
function orderedParts(zip: PizZip, idTag: string, fallback: RegExp): string[] {
  const xml = readPart(zip, PRESENTATION_PART);
  const rels = readRelationships(zip, PRESENTATION_PART);
  const ordered: string[] = [];
  if (xml) {
    for (const tag of walkTags(xml)) {
      if (tag.name !== idTag || tag.kind === "close") continue;
      const rid = getAttr(tag.attrs, "r:id");
      const target = rid ? rels.get(rid) : undefined;
      if (target && zip.file(target)) ordered.push(target);
    }
  }
  return ordered.length > 0 ? ordered : listParts(zip, fallback);
}

function notesFor(zip: PizZip, slidePart: string): string | undefined {
  for (const target of readRelationships(zip, slidePart).values()) {
    if (/notesSlide\d*\.xml$/.test(path.posix.basename(target)) && zip.file(target)) return target;
  }
  return undefined;
}

export function openPptx(zip: PizZip, opts: OpenOptions = {}): TextDocument {
  const doc = new PackageDocument("pptx", zip, DRAWING_DIALECT);
  if (!doc.hasPart(PRESENTATION_PART)) {
    throw new Error(`Not a presentation package: ${PRESENTATION_PART} is missing`);
  }

  const add = (kind: RegionKind, part: string) => {
    const loaded = doc.loadPart(part);
    doc.addRegion(kind, part, [...loaded.outsideTables, ...loaded.insideTables].sort((a, b) => a - b));
  };

  for (const slide of orderedParts(zip, "p:sldId", /^ppt\/slides\/slide\d+\.xml$/)) {
    add("slide", slide);
    if (opts.scanNotes ?? true) {
      const notes = notesFor(zip, slide);
      if (notes) add("notes", notes);
    }
  }

  if (opts.scanMasters ?? true) {
    for (const master of orderedParts(zip, "p:sldMasterId", /^ppt\/slideMasters\/slideMaster\d+\.xml$/)) {
      add("master", master);
    }
    for (const layout of listParts(zip, /^ppt\/slideLayouts\/slideLayout\d+\.xml$/)) {
      add("layout", layout);
    }
  }

  return doc;
}
