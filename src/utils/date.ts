import type { IsoDate } from '../types/record.js';

const DAY_MONTH_YEAR = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Parses a Brazilian-style 'dd/mm/yyyy' date into 'yyyy-mm-dd'.
 * Returns null unless the string names a real calendar day.
 */
export function parseDayMonthYear(raw: string): IsoDate | null {
  const match = DAY_MONTH_YEAR.exec(raw);
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);

  // setUTCFullYear keeps years below 100 literal (Date.UTC maps them to 19xx)
  // and rolls 31/02 over into March; the round trip catches the rollover
  const probe = new Date(0);
  probe.setUTCFullYear(year, month - 1, day);
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}
