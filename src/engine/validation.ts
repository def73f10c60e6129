import { ConfigError } from "./errors";
import { GATING_MODES } from "./gating";
import {
  INDICATORS,
  WEATHER_AGGREGATES,
  type EngineConfig,
  type GatingMode,
  type Indicator,
  type SupportPick,
  type WeatherAggregate,
  type WindowMode,
} from "./types";

export const WINDOW_MODES: readonly WindowMode[] = ["symmetric", "past_only"];
export const SUPPORT_PICKS: readonly SupportPick[] = ["nearest", "prefer_past"];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[]) {
  return (value: unknown): value is T => typeof value === "string" && allowed.some((a) => a === value);
}

export const isWindowMode = oneOf(WINDOW_MODES);
export const isSupportPick = oneOf(SUPPORT_PICKS);
export const isGatingMode = oneOf<GatingMode>(GATING_MODES);
export const isIndicator = oneOf<Indicator>(INDICATORS);
export const isWeatherAggregate = oneOf<WeatherAggregate>(WEATHER_AGGREGATES);

function requireFinite(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new ConfigError(field, "must be a finite number");
  }
}

function requirePositiveInt(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(field, "must be a positive integer");
  }
}

function requireNonNegativeInt(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(field, "must be a non-negative integer");
  }
}

/**
 * Reject configurations the engine cannot run with. Enum fields are checked here as well as
 * at load time, since callers can build an `EngineConfig` in code.
 */
export function validateEngineConfig(config: EngineConfig): EngineConfig {
  for (const [key, value] of Object.entries(config.thresholds)) {
    requireFinite(value, `composite_alerts.${key}`);
  }
  requireNonNegativeInt(config.thresholds.merge_gap_days, "composite_alerts.merge_gap_days");
  requirePositiveInt(config.thresholds.rs_max_age, "composite_alerts.rs_max_age");

  if (!isWindowMode(config.window.window_mode)) {
    throw new ConfigError("remote_sensing.window_mode", `must be one of ${WINDOW_MODES.join(", ")}`);
  }
  if (!isSupportPick(config.window.support_pick)) {
    throw new ConfigError("remote_sensing.support_pick", `must be one of ${SUPPORT_PICKS.join(", ")}`);
  }
  requirePositiveInt(config.window.window_half_days, "remote_sensing.window_half_days");

  if (!isGatingMode(config.gating.mode)) {
    throw new ConfigError("gating.mode", `must be one of ${GATING_MODES.join(", ")}`);
  }
  requireNonNegativeInt(config.gating.canopy_obs_min, "gating.canopy_obs_min");
  requireFinite(config.gating.canopy_ndvi_min, "gating.canopy_ndvi_min");
  requireFinite(config.gating.canopy_evi_min, "gating.canopy_evi_min");
  for (const month of config.gating.months) {
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new ConfigError("gating.months", "must contain calendar months 1-12");
    }
  }

  if (!config.qc.required_weather.every(isWeatherAggregate)) {
    throw new ConfigError("qc.required_weather", `must name only ${WEATHER_AGGREGATES.join(", ")}`);
  }
  if (!config.qc.required_indices.every(isIndicator)) {
    throw new ConfigError("qc.required_indices", `must name only ${INDICATORS.join(", ")}`);
  }

  return config;
}
