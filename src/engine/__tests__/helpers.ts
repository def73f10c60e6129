import { buildEngineConfig, type EngineConfigOverrides } from "../defaults";
import { resolveMetrics } from "../metrics";
import type {
  AlertRecord,
  Cell,
  DailyRecord,
  DebugRecord,
  EngineConfig,
  RawRow,
  RawTable,
  RuleName,
} from "../types";

/** Column values for a day with full canopy and nothing out of range. */
export function healthy(overrides: Record<string, Cell> = {}): Record<string, Cell> {
  return {
    ndvi_obs: 0.7,
    ndvi_fill: 0.7,
    evi_obs: 0.5,
    evi_fill: 0.5,
    ndmi_obs: 0.35,
    ndmi_fill: 0.35,
    ndre_fill: 0.4,
    gndvi_fill: 0.6,
    msi_fill: 1.0,
    precip_7d: 30,
    tmean_7d: 22,
    rh_7d: 70,
    tmin_7d: 12,
    ndvi_slope7: 0,
    ...overrides,
  };
}

export function tableFrom(rows: RawRow[]): RawTable {
  const columns = new Set<string>(["date"]);
  for (const row of rows) {
    for (const key of Object.keys(row.values)) columns.add(key);
  }
  return { columns: [...columns], rows };
}

export function recordFrom(values: Record<string, Cell>, date = "2025-06-01"): DailyRecord {
  const [record] = resolveMetrics(tableFrom([{ date, values }]));
  return record;
}

export function configWith(overrides: EngineConfigOverrides = {}): EngineConfig {
  return buildEngineConfig(overrides);
}

export function debugDay(date: string, overrides: Partial<DebugRecord> = {}): DebugRecord {
  return {
    date,
    real_obs_day: true,
    rs_support_date: date,
    rs_support_age: 0,
    rs_window_ok: true,
    missing_remote: false,
    missing_weather: false,
    qc_ok: true,
    skip_reason: "ok",
    canopy_obs_streak: 2,
    canopy_obs_ready: true,
    month_ok: true,
    gating_ok: true,
    allow_alert: true,
    ...overrides,
  };
}

export function alertOn(date: string, rules: RuleName[], reason = `${rules.join("+")}: test`): AlertRecord {
  return { date, event_type: rules.length === 1 ? rules[0] : "composite", reason, rules };
}
