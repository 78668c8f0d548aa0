/**
 * Word-processing adapter: exposes a .docx package as a TextDocument.
 *
 * Traversal order: body paragraphs, table paragraphs (document order,
 * nested tables included), headers, footers.
 */

import type PizZip from "pizzip";
import { escapeXml, listParts, stripInvalidXmlChars } from "../shared/xml.js";
import { PackageDocument } from "./package_document.js";
import type { Dialect } from "./package_document.js";
import type { OpenOptions, TextDocument } from "./types.js";

export const MAIN_DOCUMENT_PART = "word/document.xml";

/** Newlines become `<w:br/>` inside the same run. */
function encodeWordText(text: string): string {
  return stripInvalidXmlChars(text)
    .split(/\r\n|\r|\n/)
    .map((line) => `<w:t xml:space="preserve">${escapeXml(line)}</w:t>`)
    .join("<w:br/>");
}

export const WORD_DIALECT: Dialect = {
  paragraph: "w:p",
  run: "w:r",
  text: "w:t",
  table: "w:tbl",
  runProps: "w:rPr",
  encodeText: encodeWordText,
};

export function openDocx(zip: PizZip, opts: OpenOptions = {}): TextDocument {
  const doc = new PackageDocument("docx", zip, WORD_DIALECT);
  if (!doc.hasPart(MAIN_DOCUMENT_PART)) {
    throw new Error(`Not a word-processing package: ${MAIN_DOCUMENT_PART} is missing`);
  }

  const body = doc.loadPart(MAIN_DOCUMENT_PART);
  doc.addRegion("body", MAIN_DOCUMENT_PART, body.outsideTables);
  doc.addRegion("table", MAIN_DOCUMENT_PART, body.insideTables);

  if (opts.scanHeadersFooters ?? true) {
    for (const kind of ["header", "footer"] as const) {
      for (const part of listParts(zip, new RegExp(`^word/${kind}\\d*\\.xml$`))) {
        const loaded = doc.loadPart(part);
        doc.addRegion(kind, part, [...loaded.outsideTables, ...loaded.insideTables].sort((a, b) => a - b));
      }
    }
  }

  return doc;
}
