/**
 * Run Configuration Module
 *
 * BatchConfig is assembled from three layers, highest first:
 *   1. CLI flags
 *   2. TOKENFILL_* environment variables (.env loaded by the CLI)
 *   3. Schema defaults
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { EngineName } from "../render/types.js";

export const ENGINES = ["auto", "libreoffice", "msoffice"] as const;

export const DEFAULT_FILENAME_PATTERN = "{index:04d}.pdf";

export const BatchConfigSchema = z
  .object({
    dataPath: z.string().min(1),
    outDir: z.string().min(1),
    templatesDir: z.string().min(1),
    sheet: z.string().optional(),
    filenamePattern: z.string().min(1).default(DEFAULT_FILENAME_PATTERN),
    defaultTemplate: z.string().optional(),
    engine: z.enum(ENGINES).default("auto"),
    sofficeBin: z.string().optional(),
    pdfFilterOptions: z.string().optional(),
    strict: z.boolean().default(false),
    failOnMissingColumns: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    /** Zero-based positions in the filtered row sequence, inclusive. */
    rowFrom: z.number().int().min(0).optional(),
    rowTo: z.number().int().min(0).optional(),
    where: z.string().optional(),
    concurrency: z.number().int().min(1).max(32).default(1),
    renderTimeoutMs: z.number().int().min(0).default(120_000),
    exportRetries: z.number().int().min(0).max(10).default(2),
    retryDelayMs: z.number().int().min(0).default(500),
    fieldMatching: z.enum(["insensitive", "sensitive"]).default("insensitive"),
    defaultOnBlank: z.boolean().default(false),
    scanHeadersFooters: z.boolean().default(true),
    scanMasters: z.boolean().default(true),
    scanNotes: z.boolean().default(true),
  })
  .refine((c) => c.rowFrom === undefined || c.rowTo === undefined || c.rowFrom <= c.rowTo, {
    message: "--from must not be greater than --to",
    path: ["rowFrom"],
  });

export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type BatchConfigInput = z.input<typeof BatchConfigSchema>;

/**
 * Normalize an engine name. CLI argument takes priority over the
 * environment variable; unknown values fall back to "auto".
 */
export function parseEngine(cliArg?: string, envVar?: string): EngineName {
  const raw = (cliArg ?? envVar ?? "auto").toLowerCase().replace(/-/g, "_");
  if (raw === "libreoffice" || raw === "lo" || raw === "soffice") return "libreoffice";
  if (raw === "msoffice" || raw === "ms_office" || raw === "office") return "msoffice";
  return "auto";
}

export type Env = Readonly<Record<string, string | undefined>>;

function envInt(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new ConfigError(`${name} must be an integer, got "${raw}"`, { name });
  return n;
}

function envFieldMatching(env: Env): BatchConfigInput["fieldMatching"] {
  const raw = env.TOKENFILL_FIELD_MATCHING?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === "sensitive" || raw === "insensitive") return raw;
  throw new ConfigError(`TOKENFILL_FIELD_MATCHING must be "sensitive" or "insensitive", got "${raw}"`);
}

/** Environment layer only; undefined entries leave the schema default. */
export function configFromEnv(env: Env): Partial<BatchConfigInput> {
  return {
    sofficeBin: env.TOKENFILL_SOFFICE_BIN || undefined,
    engine: env.TOKENFILL_ENGINE ? parseEngine(undefined, env.TOKENFILL_ENGINE) : undefined,
    pdfFilterOptions: env.TOKENFILL_PDF_FILTER_OPTS || undefined,
    renderTimeoutMs: envInt(env, "TOKENFILL_RENDER_TIMEOUT_MS"),
    concurrency: envInt(env, "TOKENFILL_CONCURRENCY"),
    fieldMatching: envFieldMatching(env),
  };
}

/** Merge CLI and environment layers and validate. Throws ConfigError. */
export function loadBatchConfig(cli: Partial<BatchConfigInput>, env: Env = process.env): BatchConfig {
  const fromEnv = configFromEnv(env);
  const merged: Partial<BatchConfigInput> = {
    ...cli,
    sofficeBin: cli.sofficeBin ?? fromEnv.sofficeBin,
    engine: cli.engine ?? fromEnv.engine,
    pdfFilterOptions: cli.pdfFilterOptions ?? fromEnv.pdfFilterOptions,
    renderTimeoutMs: cli.renderTimeoutMs ?? fromEnv.renderTimeoutMs,
    concurrency: cli.concurrency ?? fromEnv.concurrency,
    fieldMatching: cli.fieldMatching ?? fromEnv.fieldMatching,
  };
  const parsed = BatchConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}
