import { isFiniteCell } from "./metrics";
import type { DailyRecord, QcConfig, QcResult, SkipReason, SupportResolution } from "./types";

/**
 * Decide whether a day's data is usable at all. Skip reasons are attributed in priority
 * order, so a day failing both the remote and the weather checks reports `missing_remote`.
 */
export function evaluateQc(record: DailyRecord, support: SupportResolution, config: QcConfig): QcResult {
  const missingRemote = !support.rs_window_ok;

  const weather = config.required_weather.map((name) => record.weather[name]);
  const missingWeather = weather.some((value) => value === null);

  const nonfinite =
    weather.some((value) => value !== null && !Number.isFinite(value)) ||
    config.required_indices.some((name) => !isFiniteCell(record.indices[name].fill));

  let skipReason: SkipReason = "ok";
  if (missingRemote) skipReason = "missing_remote";
  else if (missingWeather) skipReason = "missing_weather";
  else if (nonfinite) skipReason = "nonfinite";

  return {
    missing_remote: missingRemote,
    missing_weather: missingWeather,
    qc_ok: skipReason === "ok",
    skip_reason: skipReason,
  };
}
