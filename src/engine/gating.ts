import { monthOf } from "./dates";
import { isFiniteCell, isRealObsDay } from "./metrics";
import type { DailyRecord, GatingConfig, GatingMode, GatingResult, QcResult } from "./types";

export const GATING_MODES: readonly GatingMode[] = ["off", "month_window", "canopy_obs", "both"];

export type CanopyStreakState = {
  streak: number;
};

export function initialCanopyState(): CanopyStreakState {
  return { streak: 0 };
}

function observedCanopy(record: DailyRecord, config: GatingConfig): boolean {
  const { ndvi, evi } = record.indices;
  return (
    (isFiniteCell(ndvi.obs) && ndvi.obs >= config.canopy_ndvi_min) ||
    (isFiniteCell(evi.obs) && evi.obs >= config.canopy_evi_min)
  );
}

/** Advance the canopy streak by one day. Days without an observation carry the streak unchanged. */
export function stepCanopyStreak(
  state: CanopyStreakState,
  record: DailyRecord,
  config: GatingConfig
): CanopyStreakState {
  if (!isRealObsDay(record)) return state;
  return { streak: observedCanopy(record, config) ? state.streak + 1 : 0 };
}

function combineGating(mode: GatingMode, monthOk: boolean, canopyReady: boolean): boolean {
  switch (mode) {
    case "off":
      return true;
    case "month_window":
      return monthOk;
    case "canopy_obs":
      return canopyReady;
    case "both":
      return monthOk && canopyReady;
  }
}

/**
 * Gating flags for every day, computed as an ordered fold over the records. The records
 * must be in ascending date order; the streak depends on it.
 */
export function evaluateGating(
  records: DailyRecord[],
  qc: QcResult[],
  config: GatingConfig
): GatingResult[] {
  const months = new Set(config.months);
  const results: GatingResult[] = [];
  let state = initialCanopyState();

  records.forEach((record, i) => {
    state = stepCanopyStreak(state, record, config);
    const canopyReady = state.streak >= config.canopy_obs_min;
    const monthOk = months.has(monthOf(record.date));
    const gatingOk = combineGating(config.mode, monthOk, canopyReady);
    results.push({
      canopy_obs_streak: state.streak,
      canopy_obs_ready: canopyReady,
      month_ok: monthOk,
      gating_ok: gatingOk,
      allow_alert: qc[i].qc_ok && gatingOk,
    });
  });

  return results;
}
