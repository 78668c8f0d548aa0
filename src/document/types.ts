/**
 * Document tree capability — the only view of a template the scanner and
 * the substitution engine depend on.
 *
 * Regions, containers and spans are stable integer indices into one opened
 * document. They are meaningful only for that document (or another document
 * opened from the very same bytes).
 */

export type DocumentFormat = "docx" | "pptx";

export type RegionKind =
  | "body"     // docx paragraphs outside tables
  | "table"    // docx paragraphs inside tables
  | "header"
  | "footer"
  | "slide"
  | "notes"
  | "master"
  | "layout";

export interface RegionInfo {
  kind: RegionKind;
  /** Package part the region was read from, e.g. "word/header1.xml". */
  part: string;
}

export interface TextDocument {
  readonly format: DocumentFormat;

  /** Number of scoped regions, in traversal order. */
  regionCount(): number;
  region(index: number): RegionInfo;
  /** Text-bearing containers (paragraphs) of a region, in document order. */
  containers(region: number): readonly number[];
  /** Low-level text spans of a container, in document order. */
  spans(container: number): readonly number[];

  spanText(span: number): string;
  setSpanText(span: number, text: string): void;
  /**
   * Remove an emptied span. Returns false (and leaves an empty span in
   * place) when removing it would drop other run content.
   */
  removeSpan(span: number): boolean;

  /** Serialize the package with every edit applied. */
  toBuffer(): Buffer;
}

export interface OpenOptions {
  /** docx: include header and footer parts. */
  scanHeadersFooters?: boolean;
  /** pptx: include slide masters and layouts. */
  scanMasters?: boolean;
  /** pptx: include notes slides. */
  scanNotes?: boolean;
}
