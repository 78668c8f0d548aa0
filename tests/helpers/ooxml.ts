/**
 * In-memory OOXML packages for tests, assembled with PizZip.
 */

import PizZip from "pizzip";
import { escapeXml } from "../../src/shared/xml.js";

const W_NS = 'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"';
const P_NS =
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" ' +
  'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships" ' +
  'xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main"';
const REL_NS = 'xmlns="http://schemas.openxmlformats.org/package/2006/relationships"';

// ── Word ────────────────────────────────────────────────────────────

/** `<w:r>` with one text element. `props` is raw `<w:rPr>` markup. */
export function wRun(text: string, props = ""): string {
  return `<w:r>${props}<w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;
}

export function wPara(...runs: string[]): string {
  return `<w:p>${runs.join("")}</w:p>`;
}

/** Paragraph with one plain run per text. */
export function wText(...texts: string[]): string {
  return wPara(...texts.map((t) => wRun(t)));
}

/** Table of single-paragraph cells. */
export function wTable(rows: string[][]): string {
  const trs = rows.map((cells) => `<w:tr>${cells.map((c) => `<w:tc>${wText(c)}</w:tc>`).join("")}</w:tr>`);
  return `<w:tbl>${trs.join("")}</w:tbl>`;
}

export interface DocxParts {
  headers?: string[];
  footers?: string[];
}

export function buildDocx(body: string, parts: DocxParts = {}): Buffer {
  const zip = new PizZip();
  zip.file("[Content_Types].xml", '<?xml version="1.0" encoding="UTF-8"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>');
  zip.file("word/document.xml", `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:document ${W_NS}><w:body>${body}</w:body></w:document>`);
  (parts.headers ?? []).forEach((h, i) => zip.file(`word/header${i + 1}.xml`, `<w:hdr ${W_NS}>${h}</w:hdr>`));
  (parts.footers ?? []).forEach((f, i) => zip.file(`word/footer${i + 1}.xml`, `<w:ftr ${W_NS}>${f}</w:ftr>`));
  return Buffer.from(zip.generate({ type: "nodebuffer" }));
}

// ── Presentation ────────────────────────────────────────────────────

export function aRun(text: string): string {
  return `<a:r><a:rPr lang="en-US"/><a:t>${escapeXml(text)}</a:t></a:r>`;
}

export function aPara(...texts: string[]): string {
  return `<a:p>${texts.map(aRun).join("")}</a:p>`;
}

/** A shape holding the given paragraphs. */
export function shape(...paragraphs: string[]): string {
  return `<p:sp><p:txBody><a:bodyPr/>${paragraphs.join("")}</p:txBody></p:sp>`;
}

function slideXml(root: string, shapes: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><p:${root} ${P_NS}><p:cSld><p:spTree>${shapes}</p:spTree></p:cSld></p:${root}>`;
}

export interface PptxSpec {
  /** Slide bodies (shapes), stored as slide1.xml, slide2.xml, … */
  slides: string[];
  /** Presentation order as zero-based indices into `slides`; defaults to file order. */
  order?: number[];
  /** Notes body per zero-based slide index. */
  notes?: Record<number, string>;
  masters?: string[];
  layouts?: string[];
}

export function buildPptx(spec: PptxSpec): Buffer {
  const zip = new PizZip();
  const order = spec.order ?? spec.slides.map((_, i) => i);
  const rels: string[] = [];
  const sldIds: string[] = [];
  const masterIds: string[] = [];

  spec.slides.forEach((body, i) => {
    const n = i + 1;
    zip.file(`ppt/slides/slide${n}.xml`, slideXml("sld", body));
    rels.push(`<Relationship Id="rIdS${n}" Type="slide" Target="slides/slide${n}.xml"/>`);
    const notes = spec.notes?.[i];
    if (notes !== undefined) {
      zip.file(`ppt/notesSlides/notesSlide${n}.xml`, slideXml("notes", notes));
      zip.file(
        `ppt/slides/_rels/slide${n}.xml.rels`,
        `<Relationships ${REL_NS}><Relationship Id="rId1" Type="notesSlide" Target="../notesSlides/notesSlide${n}.xml"/></Relationships>`,
      );
    }
  });
  order.forEach((i, k) => sldIds.push(`<p:sldId id="${256 + k}" r:id="rIdS${i + 1}"/>`));

  (spec.masters ?? []).forEach((body, i) => {
    const n = i + 1;
    zip.file(`ppt/slideMasters/slideMaster${n}.xml`, slideXml("sldMaster", body));
    rels.push(`<Relationship Id="rIdM${n}" Type="slideMaster" Target="slideMasters/slideMaster${n}.xml"/>`);
    masterIds.push(`<p:sldMasterId id="${2147483648 + i}" r:id="rIdM${n}"/>`);
  });
  (spec.layouts ?? []).forEach((body, i) => {
    zip.file(`ppt/slideLayouts/slideLayout${i + 1}.xml`, slideXml("sldLayout", body));
  });

  zip.file(
    "ppt/presentation.xml",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><p:presentation ${P_NS}>` +
      `<p:sldMasterIdLst>${masterIds.join("")}</p:sldMasterIdLst><p:sldIdLst>${sldIds.join("")}</p:sldIdLst></p:presentation>`,
  );
  zip.file("ppt/_rels/presentation.xml.rels", `<Relationships ${REL_NS}>${rels.join("")}</Relationships>`);
  return Buffer.from(zip.generate({ type: "nodebuffer" }));
}

// ── Reading back ────────────────────────────────────────────────────

export function readPartText(pkg: Buffer, name: string): string {
  return new PizZip(pkg).file(name)?.asText() ?? "";
}
