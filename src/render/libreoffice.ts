/**
 * LibreOffice renderer and legacy-format converter (headless soffice).
 */

import { existsSync } from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { RendererError } from "../shared/errors.js";
import { runProcess } from "./process.js";
import type { LegacyConverter, Renderer } from "./types.js";

const CANDIDATE_BINARIES: Record<string, string[]> = {
  win32: [
    "C:\\Program Files\\LibreOffice\\program\\soffice.exe",
    "C:\\Program Files (x86)\\LibreOffice\\program\\soffice.exe",
  ],
  darwin: ["/Applications/LibreOffice.app/Contents/MacOS/soffice"],
  linux: ["/usr/bin/soffice", "/usr/lib/libreoffice/program/soffice", "/opt/libreoffice/program/soffice"],
};

/** Explicit binary, then well-known install paths, then `soffice` on PATH. */
export function findSoffice(explicit?: string): string {
  if (explicit) return explicit;
  for (const candidate of CANDIDATE_BINARIES[process.platform] ?? []) {
    if (existsSync(candidate)) return candidate;
  }
  return "soffice";
}

/** `--convert-to` argument for PDF, with export filter options when given. */
export function pdfConvertTarget(inputPath: string, filterOptions?: string): string {
  if (!filterOptions) return "pdf";
  if (/^\w+_pdf_Export(:|$)/.test(filterOptions)) return `pdf:${filterOptions}`;
  const ext = path.extname(inputPath).toLowerCase();
  const filter = ext.startsWith(".pp") || ext === ".odp" ? "impress_pdf_Export" : "writer_pdf_Export";
  return `pdf:${filter}:${filterOptions}`;
}

export interface LibreOfficeOptions {
  binary?: string;
  pdfFilterOptions?: string;
  /** Separate user profile, so a desktop instance does not block headless runs. */
  profileDir?: string;
}

export class LibreOfficeRenderer implements Renderer, LegacyConverter {
  readonly name = "libreoffice";
  readonly reentrant = false;
  readonly binary: string;
  private readonly pdfFilterOptions?: string;
  private readonly profileDir?: string;

  constructor(opts: LibreOfficeOptions = {}) {
    this.binary = findSoffice(opts.binary);
    this.pdfFilterOptions = opts.pdfFilterOptions;
    this.profileDir = opts.profileDir;
  }

  async render(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string> {
    return this.convertTo(inputPath, outDir, pdfConvertTarget(inputPath, this.pdfFilterOptions), ".pdf", signal);
  }

  async convert(inputPath: string, outDir: string, targetExt: ".docx" | ".pptx", signal?: AbortSignal): Promise<string> {
    return this.convertTo(inputPath, outDir, targetExt.slice(1), targetExt, signal);
  }

  /** `soffice --version`, or null when LibreOffice cannot be run. */
  async version(): Promise<string | null> {
    try {
      const result = await runProcess(this.binary, ["--version"]);
      return result.code === 0 ? result.stdout.trim() : null;
    } catch {
      return null;
    }
  }

  private async convertTo(
    inputPath: string,
    outDir: string,
    target: string,
    outExt: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const args = ["--headless", "--norestore", "--nolockcheck"];
    if (this.profileDir) args.push(`-env:UserInstallation=${pathToFileURL(this.profileDir).href}`);
    args.push("--convert-to", target, "--outdir", outDir, inputPath);

    const result = await runProcess(this.binary, args, { signal });
    const expected = path.join(outDir, path.basename(inputPath, path.extname(inputPath)) + outExt);
    if (result.code !== 0 || !existsSync(expected)) {
      const detail = (result.stderr || result.stdout).trim() || `exit code ${result.code}`;
      throw new RendererError(`LibreOffice could not convert ${path.basename(inputPath)}: ${detail}`, {
        inputPath,
        code: result.code,
      });
    }
    return expected;
  }
}
