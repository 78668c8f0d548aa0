/**
 * PackageDocument — index-addressed arena over the XML parts of an OOXML
 * package.
 *
 * Each part is read once. Every `<x:t>` text element becomes a span,
 * and every `<x:p>` paragraph that owns spans becomes a container. Writes
 * are recorded on the spans and spliced into the original part XML only
 * when the package is serialized, so indices never shift while the
 * substitution engine works.
 */

import PizZip from "pizzip";
import { applyEdits, decodeXmlText, walkTags } from "../shared/xml.js";
import type { XmlEdit } from "../shared/xml.js";
import type { DocumentFormat, RegionInfo, RegionKind, TextDocument } from "./types.js";

/** Element names and text encoding of one OOXML vocabulary. */
export interface Dialect {
  paragraph: string;
  run: string;
  text: string;
  table: string;
  runProps: string;
  /**
   * Full replacement markup for a text element holding `text`. `runProps`
   * is the run-properties markup of the enclosing run ("" when it has none),
   * or null when the element is not a direct child of a run.
   */
  encodeText(text: string, runProps: string | null): string;
}

interface SpanRecord {
  part: number;
  text: string;
  /** Offsets of the whole `<x:t>…</x:t>` element in the part XML. */
  start: number;
  end: number;
  /** Offsets of the enclosing run when it holds nothing but this span. */
  runRange: { start: number; end: number } | null;
  runProps: string | null;
  dirty: boolean;
  removed: boolean;
}

interface ContainerRecord {
  part: number;
  inTable: boolean;
  spans: number[];
}

interface PartRecord {
  name: string;
  xml: string;
}

interface RegionRecord extends RegionInfo {
  containers: number[];
}

export interface LoadedPart {
  /** Containers outside any table, in document order. */
  outsideTables: number[];
  /** Containers inside a table (at any depth), in document order. */
  insideTables: number[];
}

interface OpenRun {
  start: number;
  depth: number;
  spans: number[];
  others: number;
  props: string;
  propsStart: number;
}

export class PackageDocument implements TextDocument {
  readonly format: DocumentFormat;
  private readonly zip: PizZip;
  private readonly dialect: Dialect;
  private readonly parts: PartRecord[] = [];
  private readonly partIndex = new Map<string, number>();
  private readonly spanRecords: SpanRecord[] = [];
  private readonly containerRecords: ContainerRecord[] = [];
  private readonly regionRecords: RegionRecord[] = [];

  constructor(format: DocumentFormat, zip: PizZip, dialect: Dialect) {
    this.format = format;
    this.zip = zip;
    this.dialect = dialect;
  }

  // ── Building ───────────────────────────────────────────────

  /**
   * Parse a part into containers and spans. Parsing the same part twice
   * returns the containers created the first time.
   */
  loadPart(name: string): LoadedPart {
    const existing = this.partIndex.get(name);
    if (existing !== undefined) return this.splitByTable(existing);

    const entry = this.zip.file(name);
    const xml = entry ? entry.asText() : "";
    const part = this.parts.length;
    this.parts.push({ name, xml });
    this.partIndex.set(name, part);

    const d = this.dialect;
    const stack: string[] = [];
    const paragraphs: number[] = [];
    const runs: OpenRun[] = [];
    let tableDepth = 0;
    let openText: { start: number; contentStart: number } | null = null;

    for (const tag of walkTags(xml)) {
      const run = runs.at(-1);
      const isRunChild = run !== undefined && stack.length === run.depth;

      if (tag.kind === "self") {
        if (isRunChild && tag.name === d.runProps) run.props = xml.slice(tag.start, tag.end);
        else if (isRunChild) run.others++;
        continue;
      }

      if (tag.kind === "open") {
        if (isRunChild && tag.name === d.runProps) run.propsStart = tag.start;
        else if (isRunChild && tag.name !== d.text) run.others++;
        stack.push(tag.name);
        if (tag.name === d.paragraph) {
          paragraphs.push(this.containerRecords.length);
          this.containerRecords.push({ part, inTable: tableDepth > 0, spans: [] });
        } else if (tag.name === d.table) {
          tableDepth++;
        } else if (tag.name === d.run) {
          runs.push({ start: tag.start, depth: stack.length, spans: [], others: 0, props: "", propsStart: -1 });
        } else if (tag.name === d.text) {
          openText = { start: tag.start, contentStart: tag.end };
        }
        continue;
      }

      stack.pop();
      if (tag.name === d.text && openText) {
        const container = paragraphs.at(-1);
        if (container !== undefined) {
          const span = this.spanRecords.length;
          const inRun = run !== undefined && stack.length === run.depth;
          this.spanRecords.push({
            part,
            text: decodeXmlText(xml.slice(openText.contentStart, tag.start)),
            start: openText.start,
            end: tag.end,
            runRange: null,
            runProps: inRun ? run.props : null,
            dirty: false,
            removed: false,
          });
          this.containerRecords[container].spans.push(span);
          if (inRun) run.spans.push(span);
        }
        openText = null;
      } else if (tag.name === d.runProps && run && stack.length === run.depth && run.propsStart >= 0) {
        run.props = xml.slice(run.propsStart, tag.end);
      } else if (tag.name === d.run) {
        const closed = runs.pop();
        if (closed && closed.spans.length === 1 && closed.others === 0) {
          this.spanRecords[closed.spans[0]].runRange = { start: closed.start, end: tag.end };
        }
      } else if (tag.name === d.paragraph) {
        paragraphs.pop();
      } else if (tag.name === d.table) {
        tableDepth--;
      }
    }

    return this.splitByTable(part);
  }

  addRegion(kind: RegionKind, part: string, containers: number[]): void {
    const region = {
      kind,
      part,
      containers: containers.filter((c) => this.containerRecords[c].spans.length > 0),
    };
    this.regionRecords.push(region);
  }

  hasPart(name: string): boolean {
    return this.zip.file(name) !== null;
  }

  private splitByTable(part: number): LoadedPart {
    const outsideTables: number[] = [];
    const insideTables: number[] = [];
    this.containerRecords.forEach((c, idx) => {
      if (c.part !== part) return;
      (c.inTable ? insideTables : outsideTables).push(idx);
    });
    return { outsideTables, insideTables };
  }

  // ── TextDocument ───────────────────────────────────────────

  regionCount(): number {
    return this.regionRecords.length;
  }

  region(index: number): RegionInfo {
    const r = this.regionRecords[index];
    return { kind: r.kind, part: r.part };
  }

  containers(region: number): readonly number[] {
    return this.regionRecords[region].containers;
  }

  spans(container: number): readonly number[] {
    return this.containerRecords[container].spans;
  }

  spanText(span: number): string {
    return this.spanRecords[span].text;
  }

  setSpanText(span: number, text: string): void {
    const rec = this.spanRecords[span];
    if (rec.text === text && !rec.removed) return;
    rec.text = text;
    rec.dirty = true;
    rec.removed = false;
  }

  removeSpan(span: number): boolean {
    const rec = this.spanRecords[span];
    rec.text = "";
    rec.dirty = true;
    if (!rec.runRange) return false;
    rec.removed = true;
    return true;
  }

  toBuffer(): Buffer {
    const editsByPart = new Map<number, XmlEdit[]>();
    for (const rec of this.spanRecords) {
      if (!rec.dirty) continue;
      const edits = editsByPart.get(rec.part) ?? [];
      if (rec.removed && rec.runRange) {
        edits.push({ start: rec.runRange.start, end: rec.runRange.end, replacement: "" });
      } else {
        edits.push({ start: rec.start, end: rec.end, replacement: this.dialect.encodeText(rec.text, rec.runProps) });
      }
      editsByPart.set(rec.part, edits);
    }

    for (const [part, edits] of editsByPart) {
      const { name, xml } = this.parts[part];
      this.zip.file(name, applyEdits(xml, edits));
    }

    return Buffer.from(
      this.zip.generate({
        type: "nodebuffer",
        compression: "DEFLATE",
        compressionOptions: { level: 9 },
      }),
    );
  }
}
