import fs from "node:fs";
import path from "node:path";
import type { AppConfig, OutputFiles, PeriodConfig } from "../config/config";
import { SKIP_REASONS, type DebugRecord, type EngineConfig, type EngineResult, type SkipReason } from "../engine/types";

export type PassRates = {
  qc_pass_rate: number | null;
  gating_pass_rate: number | null;
  allow_alert_rate: number | null;
};

export type SkipReasonStat = {
  count: number;
  ratio: number;
};

export type QcCounts = {
  total_days: number;
  real_obs_days: number;
  rs_window_ok_days: number;
  qc_ok_days: number;
  allow_alert_days: number;
};

type Ranges = {
  data_range: { start: string; end: string };
  report_range: { start: string; end: string };
};

export type OutputSummary = {
  stage: { id: string; name: string; gating_applied?: boolean };
  paths: { inputs: string[]; output: string };
  rows: { inputs: number; output: number };
  qc_counts?: QcCounts;
  ranges: Ranges;
  pass_rates: PassRates;
  skip_reason: Partial<Record<SkipReason, SkipReasonStat>>;
  thresholds: Record<string, number | string | number[]>;
  generated_at: string;
};

export type StageRow = {
  stage: string;
  file: string;
  granularity: "days" | "alerts" | "events";
  days_count: number;
  alerts_count: number | null;
  events_count: number | null;
  removed_count: number | null;
};

export type StageSummary = {
  generated_at: string;
  totals: {
    total_days: number;
    qc_ok_days: number;
    allow_alert_days: number;
    raw_alerts: number;
    gated_alerts: number;
    events: number;
  };
  stages: StageRow[];
  ranges: Ranges;
};

export type StageSummaryInput = {
  result: EngineResult;
  engine: EngineConfig;
  period: PeriodConfig;
  inputPath: string;
  outputs: OutputFiles;
  rootDir: string;
  now?: Date;
};

const RATIO_DIGITS = 4;

function round(value: number, digits = RATIO_DIGITS): number {
  return Number(value.toFixed(digits));
}

function inRange(date: string, period: PeriodConfig): boolean {
  return date >= period.reportStart && date <= period.reportEnd;
}

/** Restrict every output to the report range; events are kept by their start date. */
export function filterResultByReportRange(result: EngineResult, period: PeriodConfig): EngineResult {
  return {
    debug: result.debug.filter((d) => inRange(d.date, period)),
    alertsRaw: result.alertsRaw.filter((a) => inRange(a.date, period)),
    alertsGated: result.alertsGated.filter((a) => inRange(a.date, period)),
    events: result.events.filter((e) => inRange(e.start_date, period)),
  };
}

/** `gating_pass_rate` is measured against QC-passing days, not all days. */
export function computePassRates(debug: DebugRecord[]): PassRates {
  if (debug.length === 0) {
    return { qc_pass_rate: null, gating_pass_rate: null, allow_alert_rate: null };
  }
  const qcOk = debug.filter((d) => d.qc_ok).length;
  const allowed = debug.filter((d) => d.qc_ok && d.gating_ok).length;
  return {
    qc_pass_rate: qcOk / debug.length,
    gating_pass_rate: qcOk ? allowed / qcOk : 0,
    allow_alert_rate: debug.filter((d) => d.allow_alert).length / debug.length,
  };
}

export function computeSkipReasonStats(debug: DebugRecord[]): Partial<Record<SkipReason, SkipReasonStat>> {
  if (debug.length === 0) return {};
  const stats: Partial<Record<SkipReason, SkipReasonStat>> = {};
  for (const reason of SKIP_REASONS) {
    const count = debug.filter((d) => d.skip_reason === reason).length;
    stats[reason] = { count, ratio: round(count / debug.length) };
  }
  return stats;
}

export function computeQcCounts(debug: DebugRecord[]): QcCounts {
  return {
    total_days: debug.length,
    real_obs_days: debug.filter((d) => d.real_obs_day).length,
    rs_window_ok_days: debug.filter((d) => d.rs_window_ok).length,
    qc_ok_days: debug.filter((d) => d.qc_ok).length,
    allow_alert_days: debug.filter((d) => d.allow_alert).length,
  };
}

export function thresholdSnapshot(engine: EngineConfig): Record<string, number | string | number[]> {
  return {
    ...engine.thresholds,
    "remote_sensing.window_half_days": engine.window.window_half_days,
    "remote_sensing.window_mode": engine.window.window_mode,
    "remote_sensing.support_pick": engine.window.support_pick,
    "gating.mode": engine.gating.mode,
    "gating.months": [...engine.gating.months],
    "gating.canopy_obs_min": engine.gating.canopy_obs_min,
    "gating.canopy_ndvi_min": engine.gating.canopy_ndvi_min,
    "gating.canopy_evi_min": engine.gating.canopy_evi_min,
  };
}

function relativeTo(rootDir: string, filePath: string): string {
  const rel = path.relative(rootDir, filePath);
  return rel.startsWith("..") || path.isAbsolute(rel) ? filePath : rel.split(path.sep).join("/");
}

export function summaryPathFor(csvPath: string): string {
  return csvPath.replace(/\.csv$/i, "") + ".summary.json";
}

export type BuiltSummaries = {
  outputs: Array<{ path: string; payload: OutputSummary }>;
  stageSummary: { path: string; payload: StageSummary };
};

export function buildStageSummaries(input: StageSummaryInput): BuiltSummaries {
  const report = filterResultByReportRange(input.result, input.period);
  const generatedAt = (input.now ?? new Date()).toISOString().replace(/\.\d{3}Z$/, "Z");
  const rel = (p: string) => relativeTo(input.rootDir, p);
  const ranges: Ranges = {
    data_range: { start: input.period.dataStart, end: input.period.dataEnd },
    report_range: { start: input.period.reportStart, end: input.period.reportEnd },
  };

  const common = {
    ranges,
    pass_rates: computePassRates(report.debug),
    skip_reason: computeSkipReasonStats(report.debug),
    thresholds: thresholdSnapshot(input.engine),
    generated_at: generatedAt,
  };
  const days = report.debug.length;
  const qcCounts = computeQcCounts(report.debug);
  const input_ = rel(input.inputPath);

  const outputs: BuiltSummaries["outputs"] = [
    {
      // The fetch stages that build the merged table run upstream, so it has no inputs here.
      path: summaryPathFor(input.inputPath),
      payload: {
        stage: { id: "stage_1", name: "merged" },
        paths: { inputs: [], output: input_ },
        rows: { inputs: days, output: days },
        ...common,
      },
    },
    {
      path: summaryPathFor(input.outputs.debug),
      payload: {
        stage: { id: "stage_2", name: "rs_debug" },
        paths: { inputs: [input_], output: rel(input.outputs.debug) },
        rows: { inputs: days, output: days },
        qc_counts: qcCounts,
        ...common,
      },
    },
    {
      path: summaryPathFor(input.outputs.alertsRaw),
      payload: {
        stage: { id: "stage_3", name: "alerts_raw", gating_applied: false },
        paths: { inputs: [input_], output: rel(input.outputs.alertsRaw) },
        rows: { inputs: days, output: report.alertsRaw.length },
        ...common,
      },
    },
    {
      path: summaryPathFor(input.outputs.alertsGated),
      payload: {
        stage: { id: "stage_4", name: "alerts_gated", gating_applied: true },
        paths: { inputs: [input_], output: rel(input.outputs.alertsGated) },
        rows: { inputs: days, output: report.alertsGated.length },
        ...common,
      },
    },
    {
      path: summaryPathFor(input.outputs.events),
      payload: {
        stage: { id: "stage_5", name: "events_merged" },
        paths: { inputs: [rel(input.outputs.alertsGated)], output: rel(input.outputs.events) },
        rows: { inputs: report.alertsGated.length, output: report.events.length },
        ...common,
      },
    },
  ];

  const { qc_ok_days: qcOkDays, allow_alert_days: allowAlertDays } = qcCounts;
  const stages: StageRow[] = [
    {
      stage: "01",
      file: input_,
      granularity: "days",
      days_count: days,
      alerts_count: null,
      events_count: null,
      removed_count: null,
    },
    {
      stage: "02",
      file: rel(input.outputs.debug),
      granularity: "days",
      days_count: qcOkDays,
      alerts_count: null,
      events_count: null,
      removed_count: Math.max(days - qcOkDays, 0),
    },
    {
      stage: "03",
      file: rel(input.outputs.alertsRaw),
      granularity: "alerts",
      days_count: qcOkDays,
      alerts_count: report.alertsRaw.length,
      events_count: null,
      removed_count: null,
    },
    {
      stage: "04",
      file: rel(input.outputs.alertsGated),
      granularity: "alerts",
      days_count: allowAlertDays,
      alerts_count: report.alertsGated.length,
      events_count: null,
      removed_count: Math.max(qcOkDays - allowAlertDays, 0),
    },
    {
      stage: "05",
      file: rel(input.outputs.events),
      granularity: "events",
      days_count: allowAlertDays,
      alerts_count: report.alertsGated.length,
      events_count: report.events.length,
      removed_count: null,
    },
  ];

  return {
    outputs,
    stageSummary: {
      path: path.join(path.dirname(input.outputs.events), "stage_summary.json"),
      payload: {
        generated_at: generatedAt,
        totals: {
          total_days: days,
          qc_ok_days: qcOkDays,
          allow_alert_days: allowAlertDays,
          raw_alerts: report.alertsRaw.length,
          gated_alerts: report.alertsGated.length,
          events: report.events.length,
        },
        stages,
        ranges,
      },
    },
  };
}

function writeJson(filePath: string, payload: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

export function writeStageSummaries(config: AppConfig, result: EngineResult, inputPath: string): BuiltSummaries {
  const built = buildStageSummaries({
    result,
    engine: config.engine,
    period: config.period,
    inputPath,
    outputs: config.outputs,
    rootDir: config.rootDir,
  });
  for (const output of built.outputs) {
    writeJson(output.path, output.payload);
  }
  writeJson(built.stageSummary.path, built.stageSummary.payload);
  return built;
}
