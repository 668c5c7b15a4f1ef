import type { IsoDate } from '../types/record.js';
import { parseDayMonthYear } from '../utils/date.js';

/**
 * Outcome of coercing one source value. `defaulted` carries the value that
 * replaced it and, when the source held something unusable, why.
 * A null reason means the source value was simply absent.
 */
export type FieldResult<T> =
  | { kind: 'value'; value: T }
  | { kind: 'defaulted'; value: T; reason: string | null };

export function value<T>(v: T): FieldResult<T> {
  return { kind: 'value', value: v };
}

export function defaulted<T>(v: T, reason: string | null = null): FieldResult<T> {
  return { kind: 'defaulted', value: v, reason };
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER = /^[+-]?\d+$/;
const NUMERIC_RUN = /(\d+\.?\d*|\.\d+)/;

function isAbsent(raw: unknown): raw is null | undefined {
  return raw === null || raw === undefined;
}

/** Short printable form of a source value for log lines. */
export function preview(raw: unknown): string {
  if (typeof raw === 'string') return `'${raw}'`;
  try {
    return JSON.stringify(raw) ?? String(raw);
  } catch {
    return `<${typeof raw}>`;
  }
}

export function toDecimal(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

export function toInteger(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? Math.trunc(raw) : null;
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  if (!INTEGER.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

/** Major currency units to minor, truncating toward zero: 49.9 -> 4990 */
export function toCents(amount: number): number {
  return Math.trunc(amount * 100);
}

export function parseProductId(raw: unknown): FieldResult<string | null> {
  if (isAbsent(raw) || raw === '') return defaulted(null);
  try {
    return value(String(raw));
  } catch {
    return defaulted(null, `identifier ${preview(raw)} cannot be read as text`);
  }
}

/** Lower-cases and trims; absent values take the field's sentinel. */
export function normalizeText(raw: unknown, fallback: string): FieldResult<string> {
  if (isAbsent(raw)) return defaulted(fallback);
  try {
    return value(String(raw).toLowerCase().trim());
  } catch {
    return defaulted(fallback, `text ${preview(raw)} cannot be normalized`);
  }
}

export function parsePriceCents(raw: unknown): FieldResult<number | null> {
  if (isAbsent(raw)) return defaulted(null);
  const amount = toDecimal(raw);
  if (amount === null) return defaulted(null, `invalid price ${preview(raw)}`);
  return value(toCents(amount));
}

/**
 * Shipping arrives as free text ('R$ 12.50', '7 reais'), so only the first
 * numeric run is read. Sign and decimal comma are not part of the run.
 */
export function parseShippingCents(raw: unknown): FieldResult<number | null> {
  if (isAbsent(raw)) return defaulted(null);
  let text: string;
  try {
    text = String(raw);
  } catch {
    return defaulted(null, `shipping cost ${preview(raw)} cannot be read as text`);
  }
  const run = NUMERIC_RUN.exec(text)?.[1];
  if (run === undefined) return defaulted(null, `no numeric value in shipping cost ${preview(raw)}`);
  const amount = toDecimal(run);
  if (amount === null) return defaulted(null, `invalid shipping cost ${preview(raw)}`);
  return value(toCents(amount));
}

export function parseCount(raw: unknown, label: string): FieldResult<number | null> {
  if (isAbsent(raw)) return defaulted(null);
  const n = toInteger(raw);
  if (n === null) return defaulted(null, `invalid ${label} ${preview(raw)}`);
  return value(n);
}

export function parseCoordinate(raw: unknown, label: string): FieldResult<number | null> {
  if (isAbsent(raw)) return defaulted(null);
  const n = toDecimal(raw);
  if (n === null) return defaulted(null, `invalid ${label} ${preview(raw)}`);
  return value(n);
}

export function parsePurchaseDate(raw: unknown): FieldResult<IsoDate | null> {
  if (typeof raw !== 'string' || raw.trim() === '') return defaulted(null);
  const parsed = parseDayMonthYear(raw.trim());
  if (parsed === null) return defaulted(null, `date ${preview(raw)} does not match dd/mm/yyyy`);
  return value(parsed);
}
