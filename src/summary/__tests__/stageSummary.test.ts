import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { parseAppConfig } from "../../config/config";
import { alertOn, configWith, debugDay } from "../../engine/__tests__/helpers";
import type { EngineResult, MergedEvent } from "../../engine/types";
import {
  buildStageSummaries,
  computePassRates,
  computeQcCounts,
  computeSkipReasonStats,
  summaryPathFor,
  writeStageSummaries,
} from "../stageSummary";

const ROOT = path.resolve("/srv/crop-alerts");
const OUT = path.join(ROOT, "data", "processed");
const OUTPUTS = {
  debug: path.join(OUT, "02_rs_debug.csv"),
  alertsRaw: path.join(OUT, "03_alerts_raw.csv"),
  alertsGated: path.join(OUT, "04_alerts_gated.csv"),
  events: path.join(OUT, "05_events.csv"),
};
const PERIOD = { dataStart: "2025-04-01", dataEnd: "2025-05-31", reportStart: "2025-05-01", reportEnd: "2025-05-31" };

function event(start: string): MergedEvent {
  return {
    event_type: "drought",
    start_date: start,
    end_date: start,
    duration_days: 1,
    peak_date: start,
    peak_value: 0.1,
    peak_metric: "ndmi_fill",
    reason_summary: "drought: test",
  };
}

const RESULT: EngineResult = {
  debug: [
    debugDay("2025-04-30"),
    debugDay("2025-05-01"),
    debugDay("2025-05-02", { canopy_obs_ready: false, gating_ok: false, allow_alert: false }),
    debugDay("2025-05-03", { missing_weather: true, qc_ok: false, skip_reason: "missing_weather", allow_alert: false }),
    debugDay("2025-05-04", {
      real_obs_day: false,
      rs_support_date: null,
      rs_support_age: 9999,
      rs_window_ok: false,
      missing_remote: true,
      qc_ok: false,
      skip_reason: "missing_remote",
      allow_alert: false,
    }),
  ],
  alertsRaw: [alertOn("2025-04-30", ["drought"]), alertOn("2025-05-01", ["drought"]), alertOn("2025-05-02", ["drought"])],
  alertsGated: [alertOn("2025-04-30", ["drought"]), alertOn("2025-05-01", ["drought"])],
  events: [event("2025-04-30"), event("2025-05-01")],
};
const REPORT_DEBUG = RESULT.debug.slice(1);

describe("summary statistics", () => {
  it("measures gating against qc-passing days", () => {
    expect(computePassRates(REPORT_DEBUG)).toEqual({
      qc_pass_rate: 0.5,
      gating_pass_rate: 0.5,
      allow_alert_rate: 0.25,
    });
  });

  it("has no rates for an empty range", () => {
    expect(computePassRates([])).toEqual({ qc_pass_rate: null, gating_pass_rate: null, allow_alert_rate: null });
  });

  it("counts every skip reason in a fixed order", () => {
    const stats = computeSkipReasonStats(REPORT_DEBUG);
    expect(Object.keys(stats)).toEqual(["missing_remote", "missing_weather", "nonfinite", "ok"]);
    expect(stats).toEqual({
      missing_remote: { count: 1, ratio: 0.25 },
      missing_weather: { count: 1, ratio: 0.25 },
      nonfinite: { count: 0, ratio: 0 },
      ok: { count: 2, ratio: 0.5 },
    });
  });

  it("counts qc flags", () => {
    expect(computeQcCounts(REPORT_DEBUG)).toEqual({
      total_days: 4,
      real_obs_days: 3,
      rs_window_ok_days: 3,
      qc_ok_days: 2,
      allow_alert_days: 1,
    });
  });
});

describe("buildStageSummaries", () => {
  const built = buildStageSummaries({
    result: RESULT,
    engine: configWith(),
    period: PERIOD,
    inputPath: path.join(OUT, "01_merged.csv"),
    outputs: OUTPUTS,
    rootDir: ROOT,
    now: new Date("2025-06-01T12:00:00.000Z"),
  });

  it("writes one summary beside each output", () => {
    expect(built.outputs.map((o) => o.path)).toEqual([
      path.join(OUT, "01_merged.summary.json"),
      path.join(OUT, "02_rs_debug.summary.json"),
      path.join(OUT, "03_alerts_raw.summary.json"),
      path.join(OUT, "04_alerts_gated.summary.json"),
      path.join(OUT, "05_events.summary.json"),
    ]);
    expect(built.stageSummary.path).toBe(path.join(OUT, "stage_summary.json"));
  });

  it("restricts counts to the report range", () => {
    const [merged, debug, raw, gated, events] = built.outputs.map((o) => o.payload);
    expect(merged.stage).toEqual({ id: "stage_1", name: "merged" });
    expect(merged.paths).toEqual({ inputs: [], output: "data/processed/01_merged.csv" });
    expect(merged.rows).toEqual({ inputs: 4, output: 4 });
    expect(debug.rows).toEqual({ inputs: 4, output: 4 });
    expect(debug.qc_counts?.qc_ok_days).toBe(2);
    expect(raw.rows).toEqual({ inputs: 4, output: 2 });
    expect(raw.stage).toEqual({ id: "stage_3", name: "alerts_raw", gating_applied: false });
    expect(gated.rows).toEqual({ inputs: 4, output: 1 });
    expect(gated.qc_counts).toBeUndefined();
    expect(events.rows).toEqual({ inputs: 1, output: 1 });
    expect(events.paths).toEqual({
      inputs: ["data/processed/04_alerts_gated.csv"],
      output: "data/processed/05_events.csv",
    });
    expect(events.generated_at).toBe("2025-06-01T12:00:00Z");
    expect(events.thresholds["gating.mode"]).toBe("canopy_obs");
  });

  it("reports per-stage removals and totals", () => {
    const { totals, stages } = built.stageSummary.payload;
    expect(totals).toEqual({
      total_days: 4,
      qc_ok_days: 2,
      allow_alert_days: 1,
      raw_alerts: 2,
      gated_alerts: 1,
      events: 1,
    });
    expect(stages.map((s) => [s.stage, s.days_count, s.removed_count])).toEqual([
      ["01", 4, null],
      ["02", 2, 2],
      ["03", 2, null],
      ["04", 1, 1],
      ["05", 1, null],
    ]);
  });
});

describe("summaryPathFor", () => {
  it("swaps the csv extension", () => {
    expect(summaryPathFor("/out/05_events.csv")).toBe("/out/05_events.summary.json");
  });
});

describe("writeStageSummaries", () => {
  it("writes the json files under the processed directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "crop-alerts-"));
    const config = parseAppConfig(
      { period: { data_start: "2025-04-01", data_end: "2025-05-31", report_start: "2025-05-01" } },
      path.join(dir, "config.yml"),
      dir
    );
    writeStageSummaries(config, RESULT, config.paths.merged);

    const stagePath = path.join(dir, "data", "processed", "stage_summary.json");
    const written: unknown = JSON.parse(fs.readFileSync(stagePath, "utf8"));
    expect(written).toMatchObject({ totals: { total_days: 4, events: 1 } });
    expect(fs.existsSync(path.join(dir, "data", "processed", "01_merged.summary.json"))).toBe(true);
    expect(fs.existsSync(path.join(dir, "data", "processed", "02_rs_debug.summary.json"))).toBe(true);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
