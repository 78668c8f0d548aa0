/**
 * Filter Registry — named string transforms applied by `{{Field|name}}`.
 *
 * Filters are bound by name at resolve time. A filter that cannot make sense
 * of its input returns it unchanged together with a warning; the registry
 * itself never throws for any input string.
 */

export const BUILTIN_FILTERS = [
  "identity",
  "trim",
  "upper",
  "lower",
  "currency",
  "euros",
  "date",
  "dmy",
] as const;

export type BuiltinFilterName = (typeof BUILTIN_FILTERS)[number];

export type FilterWarningKind = "UnknownFilter" | "UnparseableInput" | "FilterFailed";

export interface FilterWarning {
  kind: FilterWarningKind;
  filter: string;
  input: string;
  message: string;
}

export interface FilterOutcome {
  value: string;
  warning?: FilterWarning;
}

/** A filter either returns the transformed string or `null` when it cannot parse its input. */
export type FilterFn = (value: string) => string | null;

// ── Currency ────────────────────────────────────────────────────────

export interface CurrencyFormat {
  thousandsSeparator: string;
  decimalSeparator: string;
  /** Decimal mark expected in input when only one kind of separator appears. */
  inputDecimalSeparator: "." | ",";
  symbol: string;
  symbolPosition: "prefix" | "suffix";
}

export const DEFAULT_CURRENCY: CurrencyFormat = {
  thousandsSeparator: ",",
  decimalSeparator: ".",
  inputDecimalSeparator: ".",
  symbol: "",
  symbolPosition: "prefix",
};

export const EURO_CURRENCY: CurrencyFormat = {
  thousandsSeparator: ".",
  decimalSeparator: ",",
  inputDecimalSeparator: ",",
  symbol: " €",
  symbolPosition: "suffix",
};

interface DecimalParts {
  negative: boolean;
  integer: string;
  fraction: string;
}

function parseDecimal(input: string, inputDecimal: "." | ","): DecimalParts | null {
  let s = input.replace(/\s/g, "").replace(/[€$£¥]/g, "");
  let negative = false;
  if (s.startsWith("(") && s.endsWith(")")) {
    negative = true;
    s = s.slice(1, -1);
  }
  if (s.startsWith("-") || s.startsWith("+")) {
    negative = negative || s.startsWith("-");
    s = s.slice(1);
  }
  if (!/^[\d.,]+$/.test(s) || !/\d/.test(s)) return null;

  const lastDot = s.lastIndexOf(".");
  const lastComma = s.lastIndexOf(",");
  let decimalMark: string | null = null;
  let thousands: string | null = null;
  if (lastDot !== -1 && lastComma !== -1) {
    decimalMark = lastDot > lastComma ? "." : ",";
    thousands = decimalMark === "." ? "," : ".";
  } else if (lastDot !== -1 || lastComma !== -1) {
    const sep = lastDot !== -1 ? "." : ",";
    // A lone input decimal mark is a decimal point; anything else is grouping
    if (sep === inputDecimal && s.indexOf(sep) === s.lastIndexOf(sep)) decimalMark = sep;
    else thousands = sep;
  }

  let integer = s;
  let fraction = "";
  if (decimalMark) {
    const idx = s.lastIndexOf(decimalMark);
    integer = s.slice(0, idx);
    fraction = s.slice(idx + 1);
    if (!/^\d*$/.test(fraction)) return null;
  }
  if (thousands && integer.includes(thousands)) {
    const groups = integer.split(thousands);
    if (!/^\d{1,3}$/.test(groups[0]) || groups.slice(1).some((g) => !/^\d{3}$/.test(g))) return null;
    integer = groups.join("");
  }
  if (!/^\d*$/.test(integer)) return null;

  return { negative, integer: integer || "0", fraction };
}

/** Round to cents, half away from zero, in exact decimal arithmetic. */
function toCents(parts: DecimalParts): bigint {
  const frac = (parts.fraction + "000").slice(0, 3);
  let cents = BigInt(parts.integer) * 100n + BigInt(frac.slice(0, 2));
  if (Number(frac[2]) >= 5) cents += 1n;
  return cents;
}

function groupThousands(digits: string, sep: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, sep);
}

export function formatCurrency(input: string, format: CurrencyFormat = DEFAULT_CURRENCY): string | null {
  if (!input.trim()) return "";
  const parts = parseDecimal(input, format.inputDecimalSeparator);
  if (!parts) return null;

  const cents = toCents(parts);
  const whole = (cents / 100n).toString();
  const rest = (cents % 100n).toString().padStart(2, "0");
  const sign = parts.negative && cents !== 0n ? "-" : "";
  const amount = `${groupThousands(whole, format.thousandsSeparator)}${format.decimalSeparator}${rest}`;

  return format.symbolPosition === "prefix"
    ? `${sign}${format.symbol}${amount}`
    : `${sign}${amount}${format.symbol}`;
}

// ── Dates ───────────────────────────────────────────────────────────

export interface DateFormat {
  inputPatterns: string[];
  outputPattern: string;
}

export const DEFAULT_DATE: DateFormat = {
  inputPatterns: ["YYYY-M-D", "D/M/YYYY", "D-M-YYYY", "YYYY/M/D"],
  outputPattern: "DD/MM/YYYY",
};

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const DATE_TOKEN_RE = /YYYY|MM|DD|M|D/g;

function compileDatePattern(pattern: string): { re: RegExp; order: string[] } {
  const order: string[] = [];
  let source = "";
  let last = 0;
  for (const m of pattern.matchAll(DATE_TOKEN_RE)) {
    const idx = m.index ?? 0;
    source += pattern.slice(last, idx).replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    order.push(m[0]);
    source += m[0] === "YYYY" ? "(\\d{4})" : m[0].length === 2 ? "(\\d{2})" : "(\\d{1,2})";
    last = idx + m[0].length;
  }
  source += pattern.slice(last).replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return { re: new RegExp(`^${source}$`), order };
}

function isValidDate(d: CalendarDate): boolean {
  if (d.month < 1 || d.month > 12 || d.day < 1) return false;
  const daysInMonth = new Date(Date.UTC(d.year, d.month, 0)).getUTCDate();
  return d.day <= daysInMonth;
}

export function parseDate(input: string, patterns: string[]): CalendarDate | null {
  for (const pattern of patterns) {
    const { re, order } = compileDatePattern(pattern);
    const m = re.exec(input);
    if (!m) continue;
    const d: CalendarDate = { year: 0, month: 0, day: 0 };
    order.forEach((tok, i) => {
      const n = parseInt(m[i + 1], 10);
      if (tok === "YYYY") d.year = n;
      else if (tok.startsWith("M")) d.month = n;
      else d.day = n;
    });
    if (isValidDate(d)) return d;
  }
  return null;
}

export function formatDate(d: CalendarDate, pattern: string): string {
  return pattern.replace(DATE_TOKEN_RE, (tok) => {
    switch (tok) {
      case "YYYY":
        return String(d.year).padStart(4, "0");
      case "MM":
        return String(d.month).padStart(2, "0");
      case "DD":
        return String(d.day).padStart(2, "0");
      case "M":
        return String(d.month);
      default:
        return String(d.day);
    }
  });
}

export function reformatDate(input: string, format: DateFormat = DEFAULT_DATE): string | null {
  const s = input.trim();
  if (!s) return "";
  const d = parseDate(s, format.inputPatterns);
  return d ? formatDate(d, format.outputPattern) : null;
}

// ── Registry ────────────────────────────────────────────────────────

export interface FilterRegistryOptions {
  currency?: CurrencyFormat;
  date?: DateFormat;
}

export class FilterRegistry {
  private filters = new Map<string, FilterFn>();

  constructor(opts: FilterRegistryOptions = {}) {
    const currency = opts.currency ?? DEFAULT_CURRENCY;
    const date = opts.date ?? DEFAULT_DATE;

    const builtins: Record<BuiltinFilterName, FilterFn> = {
      identity: (s) => s,
      trim: (s) => s.trim(),
      upper: (s) => s.toUpperCase(),
      lower: (s) => s.toLowerCase(),
      currency: (s) => formatCurrency(s, currency),
      euros: (s) => formatCurrency(s, EURO_CURRENCY),
      date: (s) => reformatDate(s, date),
      dmy: (s) => reformatDate(s, { inputPatterns: date.inputPatterns, outputPattern: "DD/MM/YYYY" }),
    };
    for (const name of BUILTIN_FILTERS) {
      this.filters.set(name, builtins[name]);
    }
  }

  /** Register (or replace) a filter. Call at startup, before resolving. */
  register(name: string, fn: FilterFn): this {
    this.filters.set(name.trim(), fn);
    return this;
  }

  has(name: string): boolean {
    return this.filters.has(name.trim());
  }

  names(): string[] {
    return [...this.filters.keys()];
  }

  apply(name: string, value: string): FilterOutcome {
    const key = name.trim();
    const fn = this.filters.get(key);
    if (!fn) {
      return {
        value,
        warning: { kind: "UnknownFilter", filter: name, input: value, message: `Unknown filter "${name}"` },
      };
    }

    let result: string | null;
    try {
      result = fn(value);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return {
        value,
        warning: { kind: "FilterFailed", filter: key, input: value, message: `Filter "${key}" failed: ${reason}` },
      };
    }

    if (result === null) {
      return {
        value,
        warning: {
          kind: "UnparseableInput",
          filter: key,
          input: value,
          message: `Filter "${key}" could not parse "${value}"; value left unchanged`,
        },
      };
    }
    return { value: result };
  }
}
