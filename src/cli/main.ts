#!/usr/bin/env node
/**
 * CLI: tokenfill
 *
 * Usage: npm run tokenfill -- [data] [outdir] [templates] [options]
 *
 * Fills {{...}} tokens in .docx/.pptx templates, one document per data
 * row, renders each to PDF and writes _report.json / _report.csv.
 */

import "dotenv/config";
import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { parseCliArgs, USAGE } from "./args.js";
import { loadDataTable } from "../data/table_loader.js";
import { runBatch } from "../batch/orchestrator.js";
import { formatSummary, writeReports } from "../report/report.js";
import { checkEnvironment, selectRenderer } from "../render/select.js";
import { createConsoleLogger } from "../shared/log.js";
import { errorMessage } from "../shared/errors.js";
import { loadBatchConfig } from "../shared/run_config.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** package.json sits two levels up from src/cli, three from dist/src/cli. */
function readVersion(): string {
  for (const rel of ["../../package.json", "../../../package.json"]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(path.resolve(__dirname, rel), "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return "unknown";
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return;
  }
  if (args.version) {
    console.log(`tokenfill ${readVersion()}`);
    return;
  }

  const logger = createConsoleLogger({ verbose: args.verbose });
  const config = loadBatchConfig(args.config);

  if (args.check) {
    const env = await checkEnvironment({ sofficeBin: config.sofficeBin });
    logger.info("CHECK", `Platform: ${env.platform}`);
    logger.info("CHECK", `LibreOffice: ${env.libreoffice.version ?? "not available"} (${env.libreoffice.binary})`);
    logger.info("CHECK", `Microsoft Office: ${env.msoffice.available ? "available" : "not available"}`);
    return;
  }

  console.log(`  tokenfill ${readVersion()}`);
  console.log(`  Data:      ${config.dataPath}`);
  console.log(`  Templates: ${config.templatesDir}`);
  console.log(`  Output:    ${config.outDir}`);
  console.log();

  const table = await loadDataTable(config.dataPath, { sheet: config.sheet });
  for (const w of table.warnings) logger.warn("DATA", w);
  logger.info("DATA", `${table.rows.length} rows, columns: ${table.columns.join(", ")}`);

  const { renderer, converter } = selectRenderer(config.engine, {
    sofficeBin: config.sofficeBin,
    pdfFilterOptions: config.pdfFilterOptions,
    logger,
  });

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn("ROW", "Interrupted; finishing rows in progress");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const report = await runBatch(table, config, { renderer, converter, logger, signal: controller.signal });
    const { jsonPath, csvPath } = writeReports(report, config.outDir);
    logger.info("REPORT", `Report saved to: ${jsonPath}`);
    logger.info("REPORT", `Report saved to: ${csvPath}`);
    logger.info("REPORT", formatSummary(report));
    if (report.counts.ERROR > 0) process.exitCode = 1;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

main().catch((err: unknown) => {
  console.error(`  ✗ ${errorMessage(err)}`);
  process.exit(1);
});
