import type { EngineConfig, GatingConfig, QcConfig, Thresholds, WindowConfig } from "./types";

export const DEFAULT_THRESHOLDS: Thresholds = {
  ndvi_crop: 0.45,
  evi_crop: 0.35,
  rs_max_age: 5,
  ndmi_dry: 0.2,
  msi_dry: 1.5,
  precip_low7: 15.0,
  ndmi_wet: 0.45,
  precip_high7: 60.0,
  heat_tmean7: 30.0,
  heat_rh7: 60.0,
  cold_tmin7: 3.0,
  ndre_low: 0.3,
  gndvi_low: 0.5,
  slope7_drop: -0.03,
  merge_gap_days: 1,
};

export const THRESHOLD_KEYS: readonly (keyof Thresholds)[] = [
  "ndvi_crop",
  "evi_crop",
  "rs_max_age",
  "ndmi_dry",
  "msi_dry",
  "precip_low7",
  "ndmi_wet",
  "precip_high7",
  "heat_tmean7",
  "heat_rh7",
  "cold_tmin7",
  "ndre_low",
  "gndvi_low",
  "slope7_drop",
  "merge_gap_days",
];

export const DEFAULT_GROWING_MONTHS = [4, 5, 6, 7, 8, 9, 10];
export const DEFAULT_CANOPY_OBS_MIN = 2;

export type EngineConfigOverrides = {
  thresholds?: Partial<Thresholds>;
  window?: Partial<WindowConfig>;
  gating?: Partial<GatingConfig>;
  qc?: Partial<QcConfig>;
};

/**
 * Fill an engine config from defaults. The support window defaults to `rs_max_age` and the
 * canopy streak thresholds default to the crop presence thresholds, so overriding those
 * thresholds moves the dependent values with them unless they are set explicitly.
 */
export function buildEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const thresholds: Thresholds = { ...DEFAULT_THRESHOLDS, ...overrides.thresholds };
  return {
    thresholds,
    window: {
      window_half_days: overrides.window?.window_half_days ?? thresholds.rs_max_age,
      window_mode: overrides.window?.window_mode ?? "symmetric",
      support_pick: overrides.window?.support_pick ?? "prefer_past",
    },
    gating: {
      mode: overrides.gating?.mode ?? "canopy_obs",
      months: overrides.gating?.months ?? [...DEFAULT_GROWING_MONTHS],
      canopy_obs_min: overrides.gating?.canopy_obs_min ?? DEFAULT_CANOPY_OBS_MIN,
      canopy_ndvi_min: overrides.gating?.canopy_ndvi_min ?? thresholds.ndvi_crop,
      canopy_evi_min: overrides.gating?.canopy_evi_min ?? thresholds.evi_crop,
    },
    qc: {
      required_weather: overrides.qc?.required_weather ?? ["precip_7d", "tmean_7d"],
      required_indices: overrides.qc?.required_indices ?? ["ndvi", "evi", "ndmi"],
    },
  };
}
