/**
 * Batch Orchestrator — one status record per selected data row.
 *
 *   select rows → load templates → preflight → per row:
 *   skip? → template → output name → resolve + substitute → render → record
 *
 * Per-row failures become ERROR records. The batch itself aborts only on
 * configuration errors, preflight fail-fast, or a template package that
 * cannot be opened.
 */

import { copyFile, mkdir, mkdtemp, rename, rm, stat, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { openDocument } from "../document/open.js";
import { substituteDocument } from "../document/substitute.js";
import type { DataTable } from "../data/table_loader.js";
import { templateTokens, validatePreflight, RESERVED_COLUMNS } from "../preflight/validator.js";
import type { PreflightResult } from "../preflight/validator.js";
import { RenderRunner } from "../render/gate.js";
import type { LegacyConverter, Renderer } from "../render/types.js";
import { ConfigError, PreflightError, errorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/log.js";
import { silentLogger } from "../shared/log.js";
import type { BatchConfig } from "../shared/run_config.js";
import { FilterRegistry } from "../tokens/filters.js";
import { RowLookup } from "../tokens/resolver.js";
import type { RowValues } from "../tokens/resolver.js";
import { formatOutputName, sanitizeFilename } from "./output_naming.js";
import { compileWhere } from "./row_filter.js";
import { TemplateStore } from "./templates.js";
import type { LoadedTemplate, TemplateRef } from "./templates.js";

export type RowStatus = "OK" | "ERROR" | "SKIPPED" | "DRY-RUN";

export const ROW_STATUSES: readonly RowStatus[] = ["OK", "ERROR", "SKIPPED", "DRY-RUN"];

export interface RowRecord {
  /** Zero-based position of the row in the data source. */
  rowIndex: number;
  status: RowStatus;
  templateName: string;
  outputPath: string;
  warnings: string[];
  error?: string;
  bytes?: number;
}

export interface BatchReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  dataSource: string;
  engine: string;
  dryRun: boolean;
  strict: boolean;
  cancelled: boolean;
  preflight: PreflightResult;
  counts: Record<RowStatus, number>;
  records: RowRecord[];
}

export interface BatchDeps {
  /** Required unless the batch is a dry run. */
  renderer?: Renderer;
  converter?: LegacyConverter;
  logger?: Logger;
  signal?: AbortSignal;
  registry?: FilterRegistry;
}

/** Values of the SKIP column that skip a row (case-insensitive). */
export const SKIP_TRUTHY = ["1", "true", "sí", "si", "x", "y", "yes"];

export const CANCELLED_WARNING = "batch cancelled";

interface SelectedRow {
  index: number;
  row: RowValues;
}

/** Exact name of a reserved column in the table, matched case-insensitively. */
function reservedColumn(columns: readonly string[], name: string): string | undefined {
  return columns.find((c) => c.toUpperCase() === name);
}

export function isSkipValue(value: string | undefined): boolean {
  return SKIP_TRUTHY.includes((value ?? "").trim().toLowerCase());
}

export function selectRows(table: DataTable, config: BatchConfig, logger: Logger): SelectedRow[] {
  let rows: SelectedRow[] = table.rows.map((row, index) => ({ index, row }));

  if (config.where?.trim()) {
    const compiled = compileWhere(config.where, table.columns, config.fieldMatching);
    if (compiled.ok) {
      rows = rows.filter((r) => compiled.predicate(r.row));
      logger.info("ROW", `--where kept ${rows.length} of ${table.rows.length} rows`);
    } else {
      logger.warn("ROW", `${compiled.error}; filter ignored`);
    }
  }

  if (config.rowFrom !== undefined || config.rowTo !== undefined) {
    const start = config.rowFrom ?? 0;
    const stop = config.rowTo === undefined ? rows.length : config.rowTo + 1;
    rows = rows.slice(start, stop);
  }
  return rows;
}

export async function runBatch(table: DataTable, config: BatchConfig, deps: BatchDeps = {}): Promise<BatchReport> {
  const logger = deps.logger ?? silentLogger;
  const registry = deps.registry ?? new FilterRegistry();
  const startedAt = new Date().toISOString();

  const templateCol = reservedColumn(table.columns, "TEMPLATE");
  const skipCol = reservedColumn(table.columns, "SKIP");
  const outputCol = reservedColumn(table.columns, "OUTPUT");
  if (!templateCol && !config.defaultTemplate) {
    throw new ConfigError(
      `The data has no TEMPLATE column and no default template is configured. Columns: ${table.columns.join(", ")}`,
    );
  }
  if (!config.dryRun && !deps.renderer) {
    throw new ConfigError("A renderer is required unless the batch is a dry run");
  }

  const selected = selectRows(table, config, logger);
  const store = new TemplateStore({
    templatesDir: config.templatesDir,
    defaultTemplate: config.defaultTemplate,
    openOptions: {
      scanHeadersFooters: config.scanHeadersFooters,
      scanMasters: config.scanMasters,
      scanNotes: config.scanNotes,
    },
    converter: deps.converter,
    logger,
  });

  try {
    // ── Templates + preflight ─────────────────────────────────
    const refs = new Map<number, TemplateRef>();
    for (const sel of selected) {
      if (skipCol && isSkipValue(sel.row[skipCol])) continue;
      const ref = store.resolve(templateCol ? sel.row[templateCol] : undefined);
      refs.set(sel.index, ref);
      if (ref.ok) await store.load(ref, deps.signal);
    }

    const preflight = validatePreflight(
      store.loaded().map((t) => templateTokens(t.name, t.scan)),
      table.columns,
      { fieldMatching: config.fieldMatching, reservedColumns: RESERVED_COLUMNS },
    );
    logPreflight(preflight, logger);
    if (config.failOnMissingColumns && preflight.missingColumns.length > 0) {
      throw new PreflightError(preflight.missingColumns);
    }

    // ── Rows ──────────────────────────────────────────────────
    const runner = deps.renderer
      ? new RenderRunner(deps.renderer, {
          timeoutMs: config.renderTimeoutMs,
          retries: config.exportRetries,
          retryDelayMs: config.retryDelayMs,
          logger,
        })
      : undefined;

    const records = new Array<RowRecord>(selected.length);
    const total = selected.length;
    logger.info("ROW", `Rows to process: ${total}`);

    const ctx: RowContext = { config, registry, logger, store, refs, runner, templateCol, skipCol, outputCol, total };
    let cursor = 0;
    const worker = async () => {
      while (cursor < selected.length) {
        const position = cursor++;
        const sel = selected[position];
        if (deps.signal?.aborted) {
          records[position] = {
            rowIndex: sel.index,
            status: "SKIPPED",
            templateName: templateCol ? sel.row[templateCol] ?? "" : config.defaultTemplate ?? "",
            outputPath: "",
            warnings: [CANCELLED_WARNING],
          };
          continue;
        }
        records[position] = await processRow(sel, position, ctx, deps.signal);
      }
    };
    await Promise.all(Array.from({ length: Math.min(config.concurrency, Math.max(1, total)) }, worker));

    const counts: Record<RowStatus, number> = { OK: 0, ERROR: 0, SKIPPED: 0, "DRY-RUN": 0 };
    for (const r of records) counts[r.status]++;

    return {
      runId: uuidv4(),
      startedAt,
      finishedAt: new Date().toISOString(),
      dataSource: table.source,
      engine: deps.renderer?.name ?? "none",
      dryRun: config.dryRun,
      strict: config.strict,
      cancelled: deps.signal?.aborted ?? false,
      preflight,
      counts,
      records,
    };
  } finally {
    store.dispose();
  }
}

function logPreflight(result: PreflightResult, logger: Logger): void {
  const fields = new Set<string>();
  for (const exprs of Object.values(result.perTemplateTokens)) for (const e of exprs) fields.add(e.fieldName);
  logger.info("PREFLIGHT", `Templates: ${Object.keys(result.perTemplateTokens).length}, fields: ${[...fields].sort().join(", ") || "(none)"}`);
  if (result.missingColumns.length > 0) {
    logger.warn("PREFLIGHT", `Tokens without matching columns: ${result.missingColumns.join(", ")}`);
  }
  if (result.unusedColumns.length > 0) {
    logger.info("PREFLIGHT", `Columns not used by any token: ${result.unusedColumns.join(", ")}`);
  }
  for (const pe of result.parseErrors) logger.error("PREFLIGHT", `${pe.template}: ${pe.message}`);
  for (const w of result.warnings) logger.warn("PREFLIGHT", w);
}

interface RowContext {
  config: BatchConfig;
  registry: FilterRegistry;
  logger: Logger;
  store: TemplateStore;
  refs: Map<number, TemplateRef>;
  runner?: RenderRunner;
  templateCol?: string;
  skipCol?: string;
  outputCol?: string;
  total: number;
}

async function processRow(
  sel: SelectedRow,
  position: number,
  ctx: RowContext,
  signal?: AbortSignal,
): Promise<RowRecord> {
  const { config, logger } = ctx;
  const tag = `[${position + 1}/${ctx.total}]`;
  const record: RowRecord = {
    rowIndex: sel.index,
    status: "ERROR",
    templateName: ctx.templateCol ? sel.row[ctx.templateCol] ?? "" : "",
    outputPath: "",
    warnings: [],
  };
  const fail = (error: string): RowRecord => {
    logger.error("ROW", `${tag} row ${sel.index}: ${error}`);
    return { ...record, status: "ERROR", error };
  };

  if (ctx.skipCol && isSkipValue(sel.row[ctx.skipCol])) {
    logger.info("ROW", `${tag} SKIP → row ${sel.index} skipped`);
    return { ...record, status: "SKIPPED" };
  }

  const ref = ctx.refs.get(sel.index);
  if (!ref) return fail("Template was not resolved");
  record.templateName = ref.name;
  if (!ref.ok) return fail(ref.error);

  const entry = ctx.store.get(ref.path);
  if (!entry) return fail(`Template ${ref.name} was not loaded`);
  if (!entry.ok) return fail(entry.error);
  const template = entry.template;
  record.warnings.push(...template.scan.warnings.map((w) => w.message));
  if (template.scan.parseErrors.length > 0) {
    return fail(`Template ${template.name} has invalid tokens: ${template.scan.parseErrors.map((p) => p.error.message).join("; ")}`);
  }

  const lookup = new RowLookup(sel.row, config.fieldMatching);
  const named = formatOutputName(config.filenamePattern, lookup, sel.index);
  if (!named.ok) return fail(named.error);
  const subdir = ctx.outputCol ? sanitizeFilename(sel.row[ctx.outputCol] ?? "") : "";
  const targetDir = subdir ? path.join(config.outDir, subdir) : config.outDir;
  const targetPath = path.join(targetDir, named.name);
  record.outputPath = targetPath;

  let filled: Buffer;
  try {
    filled = fillTemplate(template, lookup, ctx, record.warnings);
  } catch (err) {
    // ResolveError in strict mode; nothing has been written for this row
    return fail(errorMessage(err));
  }
  for (const w of record.warnings) logger.debug("ROW", `${tag} ${w}`);

  if (config.dryRun) {
    logger.info("ROW", `${tag} [DRY-RUN] ${template.name} → ${named.name}`);
    return { ...record, status: "DRY-RUN" };
  }
  if (!ctx.runner) return fail("No renderer configured");

  logger.info("ROW", `${tag} ${template.name} → ${named.name}`);
  const workDir = await mkdtemp(path.join(os.tmpdir(), "tokenfill-row-"));
  try {
    const filledPath = path.join(workDir, `row-${sel.index}.${template.format}`);
    await writeFile(filledPath, filled);
    const pdfPath = await ctx.runner.render(filledPath, workDir, signal);
    await mkdir(targetDir, { recursive: true });
    await moveFile(pdfPath, targetPath);
    const { size } = await stat(targetPath);
    return { ...record, status: "OK", bytes: size };
  } catch (err) {
    return fail(errorMessage(err));
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

/** Fresh tree from the template bytes, substituted for one row. */
function fillTemplate(template: LoadedTemplate, lookup: RowLookup, ctx: RowContext, warnings: string[]): Buffer {
  const doc = openDocument(template.bytes, template.format, {
    scanHeadersFooters: ctx.config.scanHeadersFooters,
    scanMasters: ctx.config.scanMasters,
    scanNotes: ctx.config.scanNotes,
  }, template.name);
  const result = substituteDocument(doc, template.scan, lookup, {
    strict: ctx.config.strict,
    registry: ctx.registry,
    fieldMatching: ctx.config.fieldMatching,
    defaultOnBlank: ctx.config.defaultOnBlank,
  });
  warnings.push(...result.warnings.map((w) => `${w.field}: ${w.message}`));
  return doc.toBuffer();
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code !== "EXDEV") throw err;
    await copyFile(from, to);
    await rm(from, { force: true });
  }
}
