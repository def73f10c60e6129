import { fromDayNumber, toDayNumber } from "./dates";
import type { SupportResolution, WindowConfig } from "./types";

export const NO_SUPPORT_AGE = 9999;

/** Index of the first element >= target in an ascending array. */
function lowerBound(sorted: number[], target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function unsupported(): SupportResolution {
  return { rs_support_date: null, rs_support_age: NO_SUPPORT_AGE, rs_window_ok: false };
}

/**
 * Pick the support observation for one day among the observation days bracketing it.
 *
 * Equidistant past and future candidates only arise in `symmetric` mode. `prefer_past`
 * resolves them to the past observation; `nearest` resolves them to the most recent one,
 * which is the future observation.
 */
function pickSupport(
  day: number,
  past: number | null,
  future: number | null,
  config: WindowConfig
): number | null {
  const w = config.window_half_days;
  const pastOk = past !== null && day - past <= w;
  const futureOk = config.window_mode === "symmetric" && future !== null && future - day <= w;

  if (pastOk && futureOk) {
    const pastDistance = day - past;
    const futureDistance = future - day;
    if (pastDistance < futureDistance) return past;
    if (futureDistance < pastDistance) return future;
    return config.support_pick === "prefer_past" ? past : future;
  }
  if (pastOk) return past;
  if (futureOk) return future;
  return null;
}

/**
 * Resolve the remote-sensing support for every target day.
 *
 * Both date lists must be ascending. Each target costs one binary search over the
 * observation days, so the whole table resolves in O(n log m).
 */
export function resolveSupportWindows(
  dates: string[],
  observationDates: string[],
  config: WindowConfig
): SupportResolution[] {
  const obsDays = observationDates.map(toDayNumber);

  return dates.map((date) => {
    const day = toDayNumber(date);
    const idx = lowerBound(obsDays, day);
    const atOrAfter = idx < obsDays.length ? obsDays[idx] : null;

    if (atOrAfter === day) {
      return { rs_support_date: date, rs_support_age: 0, rs_window_ok: true };
    }

    const past = idx > 0 ? obsDays[idx - 1] : null;
    const support = pickSupport(day, past, atOrAfter, config);
    if (support === null) return unsupported();

    const age = Math.abs(day - support);
    return {
      rs_support_date: fromDayNumber(support),
      rs_support_age: age,
      rs_window_ok: age <= config.window_half_days,
    };
  });
}
