/**
 * Template store for one batch: resolves TEMPLATE cells to files, converts
 * legacy formats once per path, and memoizes scans by content hash.
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, statSync } from "fs";
import os from "os";
import path from "path";
import { classifyTemplate, openDocument } from "../document/open.js";
import { scanDocument } from "../document/scanner.js";
import type { ScanResult } from "../document/scanner.js";
import type { DocumentFormat, OpenOptions } from "../document/types.js";
import { TemplateLoadError, errorMessage } from "../shared/errors.js";
import { sha256Bytes } from "../shared/hash.js";
import type { Logger } from "../shared/log.js";
import type { LegacyConverter } from "../render/types.js";

export interface LoadedTemplate {
  /** Name as written in the data (or the default template). */
  name: string;
  /** Resolved source file. */
  sourcePath: string;
  /** OOXML file actually used (differs from sourcePath after conversion). */
  path: string;
  format: DocumentFormat;
  bytes: Buffer;
  hash: string;
  scan: ScanResult;
}

export type TemplateRef = { ok: true; name: string; path: string } | { ok: false; name: string; error: string };

export type TemplateEntry = { ok: true; template: LoadedTemplate } | { ok: false; error: string };

export interface TemplateStoreOptions {
  templatesDir: string;
  defaultTemplate?: string;
  openOptions: OpenOptions;
  converter?: LegacyConverter;
  logger: Logger;
}

export class TemplateStore {
  private readonly entries = new Map<string, TemplateEntry>();
  private readonly scans = new Map<string, ScanResult>();
  private conversionDir: string | undefined;

  constructor(private readonly opts: TemplateStoreOptions) {}

  /** A file name only, under templatesDir; an empty cell falls back to the default template. */
  resolve(cell: string | undefined): TemplateRef {
    let name = (cell ?? "").trim();
    if (!name) {
      if (!this.opts.defaultTemplate) {
        return { ok: false, name, error: "TEMPLATE is empty and no default template is configured" };
      }
      name = this.opts.defaultTemplate;
    }
    if (name.includes("/") || name.includes("\\")) {
      return { ok: false, name, error: `TEMPLATE must be a file name only (no directories). Received: "${name}"` };
    }
    if (classifyTemplate(name).kind === "unsupported") {
      return { ok: false, name, error: `Unsupported template extension: "${path.extname(name) || name}"` };
    }
    const filePath = path.resolve(this.opts.templatesDir, name);
    if (!existsSync(filePath) || !statSync(filePath).isFile()) {
      return { ok: false, name, error: `Template file not found: ${filePath}` };
    }
    return { ok: true, name, path: filePath };
  }

  get(filePath: string): TemplateEntry | undefined {
    return this.entries.get(filePath);
  }

  loaded(): LoadedTemplate[] {
    const out: LoadedTemplate[] = [];
    for (const entry of this.entries.values()) if (entry.ok) out.push(entry.template);
    return out;
  }

  /**
   * Load (once per path). A conversion failure is recorded for the rows
   * that use the template; a package that cannot be opened throws
   * TemplateLoadError.
   */
  async load(ref: { name: string; path: string }, signal?: AbortSignal): Promise<TemplateEntry> {
    const cached = this.entries.get(ref.path);
    if (cached) return cached;

    const kind = classifyTemplate(ref.path);
    let ooxmlPath = ref.path;
    let format: DocumentFormat;

    if (kind.kind === "native") {
      format = kind.format;
    } else if (kind.kind === "legacy") {
      format = kind.target === ".docx" ? "docx" : "pptx";
      if (!this.opts.converter) {
        return this.remember(ref.path, { ok: false, error: `No converter available for legacy template ${ref.name}` });
      }
      try {
        this.conversionDir ??= mkdtempSync(path.join(os.tmpdir(), "tokenfill-convert-"));
        const outDir = mkdtempSync(path.join(this.conversionDir, "t-"));
        ooxmlPath = await this.opts.converter.convert(ref.path, outDir, kind.target, signal);
        this.opts.logger.info("TEMPLATE", `Converted ${ref.name} → ${path.basename(ooxmlPath)}`);
      } catch (err) {
        return this.remember(ref.path, { ok: false, error: `Conversion of ${ref.name} failed: ${errorMessage(err)}` });
      }
    } else {
      return this.remember(ref.path, { ok: false, error: `Unsupported template extension: ${path.extname(ref.path)}` });
    }

    let bytes: Buffer;
    try {
      bytes = readFileSync(ooxmlPath);
    } catch (err) {
      throw new TemplateLoadError(`Cannot read template ${ref.name}: ${errorMessage(err)}`, { path: ooxmlPath });
    }

    const hash = sha256Bytes(bytes);
    let scan = this.scans.get(hash);
    if (!scan) {
      scan = scanDocument(openDocument(bytes, format, this.opts.openOptions, ref.name));
      this.scans.set(hash, scan);
    }

    return this.remember(ref.path, {
      ok: true,
      template: { name: ref.name, sourcePath: ref.path, path: ooxmlPath, format, bytes, hash, scan },
    });
  }

  /** Remove converted copies. */
  dispose(): void {
    if (this.conversionDir) rmSync(this.conversionDir, { recursive: true, force: true });
    this.conversionDir = undefined;
  }

  private remember(filePath: string, entry: TemplateEntry): TemplateEntry {
    this.entries.set(filePath, entry);
    return entry;
  }
}
