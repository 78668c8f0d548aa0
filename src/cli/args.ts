/**
 * Hand-rolled argument parsing for the tokenfill CLI.
 */

import { ConfigError } from "../shared/errors.js";
import type { BatchConfigInput } from "../shared/run_config.js";
import { parseEngine } from "../shared/run_config.js";

export const USAGE = `Usage: tokenfill [data] [outdir] [templates] [options]

  data                     .xlsx or .csv file (default: data.xlsx)
  outdir                   output directory (default: out)
  templates                template directory (default: templates)

Options:
  --sheet <name|index>     XLSX sheet (default: first)
  --pattern <pattern>      output file name, e.g. "{index:04d}_{Name}.pdf"
  --engine <name>          auto | libreoffice | msoffice
  --strict                 missing undefaulted fields fail the row
  --fail-on-missing        abort when a token has no matching column
  --dry-run                resolve and substitute, but do not render
  --pdf-filter-opts <s>    LibreOffice PDF export options
  --from <n>  --to <n>     zero-based row range (inclusive, after --where)
  --where <expr>           e.g. "Course == 'A' and City != 'Lyon'"
  --concurrency <n>        rows processed in parallel (default 1)
  --timeout <ms>           per-render timeout
  --retries <n>            export retries (default 2)
  --case-sensitive         match fields to columns case-sensitively
  --default-on-blank       blank cells take the token default
  --default-template <f>   template for rows with an empty TEMPLATE cell
  --no-headers-footers     skip docx headers and footers
  --no-masters             skip pptx masters and layouts
  --no-notes               skip pptx notes slides
  --verbose                debug logging
  --check                  probe LibreOffice / Microsoft Office and exit
  --version                print the version and exit`;

export interface CliArgs {
  config: Partial<BatchConfigInput>;
  verbose: boolean;
  check: boolean;
  version: boolean;
  help: boolean;
}

function toInt(flag: string, raw: string | undefined): number {
  const n = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isInteger(n)) {
    throw new ConfigError(`${flag} expects an integer, got "${raw ?? ""}"`);
  }
  return n;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const config: Partial<BatchConfigInput> = {};
  const out: CliArgs = { config, verbose: false, check: false, version: false, help: false };
  const positional: string[] = [];

  const valueOf = (i: number, flag: string): string => {
    const v = argv[i + 1];
    if (v === undefined || v.startsWith("--")) throw new ConfigError(`${flag} expects a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--data":
        config.dataPath = valueOf(i++, arg);
        break;
      case "--out":
        config.outDir = valueOf(i++, arg);
        break;
      case "--templates":
        config.templatesDir = valueOf(i++, arg);
        break;
      case "--sheet":
        config.sheet = valueOf(i++, arg);
        break;
      case "--pattern":
        config.filenamePattern = valueOf(i++, arg);
        break;
      case "--engine":
        config.engine = parseEngine(valueOf(i++, arg));
        break;
      case "--pdf-filter-opts":
        config.pdfFilterOptions = valueOf(i++, arg);
        break;
      case "--from":
        config.rowFrom = toInt(arg, valueOf(i++, arg));
        break;
      case "--to":
        config.rowTo = toInt(arg, valueOf(i++, arg));
        break;
      case "--where":
        config.where = valueOf(i++, arg);
        break;
      case "--concurrency":
        config.concurrency = toInt(arg, valueOf(i++, arg));
        break;
      case "--timeout":
        config.renderTimeoutMs = toInt(arg, valueOf(i++, arg));
        break;
      case "--retries":
        config.exportRetries = toInt(arg, valueOf(i++, arg));
        break;
      case "--default-template":
        config.defaultTemplate = valueOf(i++, arg);
        break;
      case "--strict":
        config.strict = true;
        break;
      case "--fail-on-missing":
        config.failOnMissingColumns = true;
        break;
      case "--dry-run":
        config.dryRun = true;
        break;
      case "--case-sensitive":
        config.fieldMatching = "sensitive";
        break;
      case "--default-on-blank":
        config.defaultOnBlank = true;
        break;
      case "--no-headers-footers":
        config.scanHeadersFooters = false;
        break;
      case "--no-masters":
        config.scanMasters = false;
        break;
      case "--no-notes":
        config.scanNotes = false;
        break;
      case "--verbose":
      case "-v":
        out.verbose = true;
        break;
      case "--check":
        out.check = true;
        break;
      case "--version":
        out.version = true;
        break;
      case "--help":
      case "-h":
        out.help = true;
        break;
      default:
        if (arg.startsWith("-")) throw new ConfigError(`Unknown option ${arg}`);
        positional.push(arg);
    }
  }

  if (positional.length > 3) throw new ConfigError(`Too many arguments: ${positional.slice(3).join(" ")}`);
  config.dataPath ??= positional[0] ?? "data.xlsx";
  config.outDir ??= positional[1] ?? "out";
  config.templatesDir ??= positional[2] ?? "templates";
  return out;
}
