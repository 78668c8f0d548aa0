/**
 * Renderer seam — the batch orchestrator only knows this interface.
 */

export type EngineName = "auto" | "libreoffice" | "msoffice";

export interface Renderer {
  readonly name: string;
  /** When false, calls are serialized through a single-flight gate. */
  readonly reentrant: boolean;
  /**
   * Convert `inputPath` to PDF inside `outDir` and return the PDF path.
   * Failures are RendererError; `signal` aborts the underlying process.
   */
  render(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string>;
}

/** Normalizes legacy office formats to OOXML. */
export interface LegacyConverter {
  convert(inputPath: string, outDir: string, targetExt: ".docx" | ".pptx", signal?: AbortSignal): Promise<string>;
}
