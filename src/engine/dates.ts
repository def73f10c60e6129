import { EngineSchemaError } from "./errors";

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

/** Normalize `YYYY-MM-DD` or an ISO timestamp to its calendar date part. */
export function parseIsoDate(raw: string): string {
  const match = raw.trim().match(ISO_DATE);
  if (!match) {
    throw new EngineSchemaError(`Unparseable date: "${raw}"`);
  }
  const [, y, m, d] = match;
  const utc = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  const normalized = utc.toISOString().slice(0, 10);
  if (normalized !== `${y}-${m}-${d}`) {
    throw new EngineSchemaError(`Invalid calendar date: "${raw}"`);
  }
  return normalized;
}

/** Days since 1970-01-01 for an already-normalized date string. */
export function toDayNumber(dateStr: string): number {
  const [y, m, d] = dateStr.split("-").map(Number);
  return Math.round(Date.UTC(y, m - 1, d) / DAY_MS);
}

export function fromDayNumber(day: number): string {
  return new Date(day * DAY_MS).toISOString().slice(0, 10);
}

export function shiftDate(dateStr: string, days: number): string {
  return fromDayNumber(toDayNumber(dateStr) + days);
}

export function daysBetween(from: string, to: string): number {
  return toDayNumber(to) - toDayNumber(from);
}

export function monthOf(dateStr: string): number {
  return Number(dateStr.slice(5, 7));
}
