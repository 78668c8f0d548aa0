/**
 * Error hierarchy for tokenfill.
 *
 * Hard failures are thrown as a subclass of TokenfillError carrying a stable
 * `code`. Soft outcomes (filter fallbacks, unterminated tokens, preflight
 * findings) are returned as values and never thrown.
 */

export class TokenfillError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type TokenParseErrorKind = "EmptyFieldName" | "MalformedDefault" | "NestedDelimiter";

/** Malformed `{{...}}` syntax. Blocks the template it was found in. */
export class TokenParseError extends TokenfillError {
  public readonly kind: TokenParseErrorKind;
  public readonly raw: string;

  constructor(kind: TokenParseErrorKind, raw: string, detail: string) {
    super(`Invalid token {{${raw}}}: ${detail}`, "TOKEN_PARSE_ERROR", { kind, raw });
    this.kind = kind;
    this.raw = raw;
  }
}

export type ResolveErrorKind = "MissingRequiredField";

/** Strict-mode resolution failure. Aborts the row's document. */
export class ResolveError extends TokenfillError {
  public readonly kind: ResolveErrorKind;
  public readonly field: string;

  constructor(field: string) {
    super(`Missing required field "${field}" (strict mode)`, "MISSING_REQUIRED_FIELD", { field });
    this.kind = "MissingRequiredField";
    this.field = field;
  }
}

export class TemplateLoadError extends TokenfillError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TEMPLATE_LOAD_ERROR", context);
  }
}

export class PreflightError extends TokenfillError {
  public readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(
      `Missing data columns for tokens: ${missingColumns.join(", ")}`,
      "PREFLIGHT_MISSING_COLUMNS",
      { missingColumns },
    );
    this.missingColumns = missingColumns;
  }
}

/** Opaque renderer failure; only the message is interpreted. */
export class RendererError extends TokenfillError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "RENDERER_ERROR", context);
  }
}

export class RenderTimeoutError extends RendererError {
  constructor(timeoutMs: number) {
    super(`Renderer timed out after ${timeoutMs} ms`, { timeoutMs });
  }
}

export class ConfigError extends TokenfillError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
  }
}

export class DataSourceError extends TokenfillError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "DATA_SOURCE_ERROR", context);
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
