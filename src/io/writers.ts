import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { AlertRecord, DebugRecord, EngineResult, MergedEvent } from "../engine/types";

export const ALERT_COLUMNS = ["date", "event_type", "reason"] as const;

export const EVENT_COLUMNS = [
  "event_type",
  "start_date",
  "end_date",
  "duration_days",
  "peak_date",
  "peak_value",
  "peak_metric",
  "reason_summary",
] as const;

export const DEBUG_COLUMNS = [
  "date",
  "real_obs_day",
  "rs_support_date",
  "rs_support_age",
  "rs_window_ok",
  "missing_remote",
  "missing_weather",
  "qc_ok",
  "skip_reason",
  "canopy_obs_streak",
  "canopy_obs_ready",
  "month_ok",
  "gating_ok",
  "allow_alert",
] as const;

type AlertColumn = (typeof ALERT_COLUMNS)[number];
type EventColumn = (typeof EVENT_COLUMNS)[number];
type DebugColumn = (typeof DEBUG_COLUMNS)[number];

const PEAK_VALUE_DIGITS = 4;

type CsvValue = string | number | boolean | null;

function formatValue(value: CsvValue): string {
  if (value === null) return "";
  if (typeof value === "boolean") return value ? "true" : "false";
  return String(value);
}

function toCsv<K extends string>(columns: readonly K[], rows: Array<Record<K, CsvValue>>): string {
  return stringify([[...columns], ...rows.map((row) => columns.map((c) => formatValue(row[c])))]);
}

export function alertsToCsv(alerts: AlertRecord[]): string {
  return toCsv<AlertColumn>(ALERT_COLUMNS, alerts);
}

export function roundPeak(value: number | null): number | null {
  if (value === null) return null;
  return Number(value.toFixed(PEAK_VALUE_DIGITS));
}

export function eventsToCsv(events: MergedEvent[]): string {
  return toCsv<EventColumn>(
    EVENT_COLUMNS,
    events.map((e) => ({ ...e, peak_value: roundPeak(e.peak_value) }))
  );
}

export function debugToCsv(debug: DebugRecord[]): string {
  return toCsv<DebugColumn>(DEBUG_COLUMNS, debug);
}

export type OutputPaths = {
  alertsRaw: string;
  alertsGated: string;
  events: string;
  debug: string;
};

function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
}

/** Serialize every output before touching the disk so a failure leaves no partial set. */
export function writeEngineOutputs(result: EngineResult, paths: OutputPaths): void {
  const files: Array<[string, string]> = [
    [paths.debug, debugToCsv(result.debug)],
    [paths.alertsRaw, alertsToCsv(result.alertsRaw)],
    [paths.alertsGated, alertsToCsv(result.alertsGated)],
    [paths.events, eventsToCsv(result.events)],
  ];
  for (const [filePath, content] of files) {
    writeFile(filePath, content);
  }
}
