export { parseToken, serializeToken, tokenKey, tokensEqual, dedupeTokens, TOKEN_OPEN, TOKEN_CLOSE } from "./tokens/grammar.js";
export type { TokenExpression, ParseOutcome } from "./tokens/grammar.js";
export {
  FilterRegistry,
  BUILTIN_FILTERS,
  DEFAULT_CURRENCY,
  EURO_CURRENCY,
  DEFAULT_DATE,
  formatCurrency,
  reformatDate,
} from "./tokens/filters.js";
export type { FilterFn, FilterWarning, FilterOutcome, CurrencyFormat, DateFormat } from "./tokens/filters.js";
export { resolveToken, RowLookup } from "./tokens/resolver.js";
export type { RowValues, FieldMatching, ResolveOptions, ResolveOutcome } from "./tokens/resolver.js";

export type { TextDocument, DocumentFormat, RegionInfo, RegionKind, OpenOptions } from "./document/types.js";
export { openDocument, classifyTemplate, containerTexts } from "./document/open.js";
export { openDocx } from "./document/docx.js";
export { openPptx } from "./document/pptx.js";
export { scanDocument, scannedExpressions } from "./document/scanner.js";
export type { ScanResult, TokenOccurrence, TokenLocation, ScanWarning } from "./document/scanner.js";
export { substituteDocument } from "./document/substitute.js";
export type { SubstituteResult, CellWarning } from "./document/substitute.js";

export { validatePreflight, templateTokens, RESERVED_COLUMNS } from "./preflight/validator.js";
export type { PreflightResult, TemplateTokens } from "./preflight/validator.js";

export { loadDataTable, buildTable } from "./data/table_loader.js";
export type { DataTable } from "./data/table_loader.js";

export { runBatch, selectRows } from "./batch/orchestrator.js";
export type { BatchReport, BatchDeps, RowRecord, RowStatus } from "./batch/orchestrator.js";
export { writeReports } from "./report/report.js";

export type { Renderer, LegacyConverter, EngineName } from "./render/types.js";
export { LibreOfficeRenderer } from "./render/libreoffice.js";
export { MsOfficeRenderer } from "./render/msoffice.js";
export { FallbackRenderer } from "./render/fallback.js";
export { selectRenderer, checkEnvironment } from "./render/select.js";

export { BatchConfigSchema, loadBatchConfig, parseEngine } from "./shared/run_config.js";
export type { BatchConfig, BatchConfigInput } from "./shared/run_config.js";
export * from "./shared/errors.js";
export { createConsoleLogger, silentLogger } from "./shared/log.js";
export type { Logger } from "./shared/log.js";
