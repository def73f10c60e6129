export const INDICATORS = ["ndvi", "evi", "ndmi", "ndre", "gndvi", "msi"] as const;
export type Indicator = (typeof INDICATORS)[number];

export const WEATHER_AGGREGATES = ["precip_7d", "tmean_7d", "rh_7d", "tmin_7d"] as const;
export type WeatherAggregate = (typeof WEATHER_AGGREGATES)[number];

export const EVENT_TYPES = [
  "drought",
  "waterlogging",
  "heat_stress",
  "cold_stress",
  "nutrient_or_pest",
  "composite",
] as const;
export type EventType = (typeof EVENT_TYPES)[number];
export type RuleName = Exclude<EventType, "composite">;

export const SKIP_REASONS = ["missing_remote", "missing_weather", "nonfinite", "ok"] as const;
export type SkipReason = (typeof SKIP_REASONS)[number];

export type WindowMode = "symmetric" | "past_only";
export type SupportPick = "nearest" | "prefer_past";
export type GatingMode = "off" | "month_window" | "canopy_obs" | "both";

/** A nullable numeric cell: null means absent, +/-Infinity is kept as non-finite. */
export type Cell = number | null;

/** One row of the input table before column resolution. */
export type RawRow = {
  date: string;
  values: Record<string, Cell>;
};

export type RawTable = {
  columns: string[];
  rows: RawRow[];
};

export type IndicatorPair = {
  obs: Cell;
  fill: Cell;
};

export type DailyRecord = {
  date: string;
  indices: Record<Indicator, IndicatorPair>;
  weather: Record<WeatherAggregate, Cell>;
  ndvi_slope7: Cell;
};

export type SupportResolution = {
  rs_support_date: string | null;
  rs_support_age: number;
  rs_window_ok: boolean;
};

export type QcResult = {
  missing_remote: boolean;
  missing_weather: boolean;
  qc_ok: boolean;
  skip_reason: SkipReason;
};

export type GatingResult = {
  canopy_obs_streak: number;
  canopy_obs_ready: boolean;
  month_ok: boolean;
  gating_ok: boolean;
  allow_alert: boolean;
};

export type DebugRecord = {
  date: string;
  real_obs_day: boolean;
} & SupportResolution &
  QcResult &
  GatingResult;

export type AlertRecord = {
  date: string;
  event_type: EventType;
  reason: string;
  /** Rules that fired on this day, in evaluation order. */
  rules: RuleName[];
};

export type MergedEvent = {
  event_type: EventType;
  start_date: string;
  end_date: string;
  duration_days: number;
  peak_date: string;
  peak_value: number | null;
  peak_metric: string | null;
  reason_summary: string;
};

export type Thresholds = {
  ndvi_crop: number;
  evi_crop: number;
  rs_max_age: number;
  ndmi_dry: number;
  msi_dry: number;
  precip_low7: number;
  ndmi_wet: number;
  precip_high7: number;
  heat_tmean7: number;
  heat_rh7: number;
  cold_tmin7: number;
  ndre_low: number;
  gndvi_low: number;
  slope7_drop: number;
  merge_gap_days: number;
};

export type WindowConfig = {
  window_half_days: number;
  window_mode: WindowMode;
  support_pick: SupportPick;
};

export type GatingConfig = {
  mode: GatingMode;
  months: number[];
  canopy_obs_min: number;
  canopy_ndvi_min: number;
  canopy_evi_min: number;
};

export type QcConfig = {
  required_weather: WeatherAggregate[];
  required_indices: Indicator[];
};

export type EngineConfig = {
  thresholds: Thresholds;
  window: WindowConfig;
  gating: GatingConfig;
  qc: QcConfig;
};

export type EngineResult = {
  alertsRaw: AlertRecord[];
  alertsGated: AlertRecord[];
  events: MergedEvent[];
  debug: DebugRecord[];
};
