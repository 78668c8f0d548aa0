/**
 * Opening template packages by file type.
 */

import path from "path";
import PizZip from "pizzip";
import { TemplateLoadError, errorMessage } from "../shared/errors.js";
import { openDocx } from "./docx.js";
import { openPptx } from "./pptx.js";
import type { DocumentFormat, OpenOptions, TextDocument } from "./types.js";

const NATIVE_EXTENSIONS: Record<string, DocumentFormat> = {
  ".docx": "docx",
  ".docm": "docx",
  ".dotx": "docx",
  ".dotm": "docx",
  ".pptx": "pptx",
  ".pptm": "pptx",
  ".potx": "pptx",
  ".ppsx": "pptx",
};

/** Formats normalized to OOXML by the legacy converter before use. */
export const LEGACY_TARGETS: Record<string, ".docx" | ".pptx"> = {
  ".doc": ".docx",
  ".odt": ".docx",
  ".rtf": ".docx",
  ".ppt": ".pptx",
  ".odp": ".pptx",
};

export type TemplateKind =
  | { kind: "native"; format: DocumentFormat }
  | { kind: "legacy"; target: ".docx" | ".pptx" }
  | { kind: "unsupported" };

export function classifyTemplate(filePath: string): TemplateKind {
  const ext = path.extname(filePath).toLowerCase();
  const format = NATIVE_EXTENSIONS[ext];
  if (format) return { kind: "native", format };
  const target = LEGACY_TARGETS[ext];
  if (target) return { kind: "legacy", target };
  return { kind: "unsupported" };
}

/** Open package bytes as a TextDocument; any structural problem is a TemplateLoadError. */
export function openDocument(
  bytes: Buffer,
  format: DocumentFormat,
  opts: OpenOptions = {},
  label = "template",
): TextDocument {
  let zip: PizZip;
  try {
    zip = new PizZip(bytes);
  } catch (err) {
    throw new TemplateLoadError(`Cannot open ${label} as a ${format} package: ${errorMessage(err)}`, { label });
  }
  try {
    return format === "docx" ? openDocx(zip, opts) : openPptx(zip, opts);
  } catch (err) {
    throw new TemplateLoadError(`Cannot read ${label}: ${errorMessage(err)}`, { label });
  }
}

/** Concatenated text of every container, one string per container. Handy for checks and tests. */
export function containerTexts(doc: TextDocument): string[] {
  const out: string[] = [];
  for (let r = 0; r < doc.regionCount(); r++) {
    for (const c of doc.containers(r)) {
      out.push(doc.spans(c).map((s) => doc.spanText(s)).join(""));
    }
  }
  return out;
}
