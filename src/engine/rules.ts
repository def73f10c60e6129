import { isFiniteCell } from "./metrics";
import type {
  AlertRecord,
  Cell,
  DailyRecord,
  DebugRecord,
  EventType,
  RuleName,
  Thresholds,
} from "./types";

export const METRIC_NAMES = [
  "ndvi_fill",
  "evi_fill",
  "ndmi_fill",
  "msi_fill",
  "ndre_fill",
  "gndvi_fill",
  "precip_7d",
  "tmean_7d",
  "rh_7d",
  "tmin_7d",
  "ndvi_slope7",
] as const;
export type MetricName = (typeof METRIC_NAMES)[number];

/** Metric values for one day with every non-finite value replaced by NaN, so comparisons on it are false. */
export type DayMetrics = Record<MetricName, number>;

const COLD_EVI_WEAK = 0.4;
const COLD_NDVI_WEAK = 0.5;

type IntensityTerm = {
  metric: MetricName;
  distance: (m: DayMetrics, t: Thresholds) => number;
};

export type RuleDescriptor = {
  name: RuleName;
  inputs: readonly MetricName[];
  predicate: (m: DayMetrics, t: Thresholds) => boolean;
  evidence: (m: DayMetrics) => string;
  /** Signed distance past the rule's own thresholds, one term per driving metric. */
  intensity: readonly IntensityTerm[];
};

export type Intensity = {
  value: number;
  metric: MetricName;
};

function finiteOrNaN(value: Cell): number {
  return isFiniteCell(value) ? value : Number.NaN;
}

export function readMetrics(record: DailyRecord): DayMetrics {
  const { indices, weather } = record;
  return {
    ndvi_fill: finiteOrNaN(indices.ndvi.fill),
    evi_fill: finiteOrNaN(indices.evi.fill),
    ndmi_fill: finiteOrNaN(indices.ndmi.fill),
    msi_fill: finiteOrNaN(indices.msi.fill),
    ndre_fill: finiteOrNaN(indices.ndre.fill),
    gndvi_fill: finiteOrNaN(indices.gndvi.fill),
    precip_7d: finiteOrNaN(weather.precip_7d),
    tmean_7d: finiteOrNaN(weather.tmean_7d),
    rh_7d: finiteOrNaN(weather.rh_7d),
    tmin_7d: finiteOrNaN(weather.tmin_7d),
    ndvi_slope7: finiteOrNaN(record.ndvi_slope7),
  };
}

function describe(m: DayMetrics, keys: readonly MetricName[]): string {
  return keys.map((key) => `${key}=${m[key].toFixed(3)}`).join(", ");
}

export function canopyPresent(m: DayMetrics, t: Thresholds): boolean {
  return m.ndvi_fill >= t.ndvi_crop || m.evi_fill >= t.evi_crop;
}

const DROUGHT_INPUTS = ["ndmi_fill", "msi_fill", "precip_7d"] as const;
const WATERLOGGING_INPUTS = ["ndmi_fill", "precip_7d", "evi_fill", "ndvi_fill"] as const;
const HEAT_INPUTS = ["tmean_7d", "rh_7d", "evi_fill", "ndvi_slope7"] as const;
const COLD_INPUTS = ["tmin_7d", "evi_fill", "ndvi_fill", "ndvi_slope7"] as const;
const NUTRIENT_INPUTS = ["ndre_fill", "gndvi_fill", "ndmi_fill"] as const;

/**
 * Stress rules in evaluation order. The order only affects how evidence is listed for a
 * composite day; every rule is evaluated on its own.
 */
export const RULES: readonly RuleDescriptor[] = [
  {
    name: "drought",
    inputs: DROUGHT_INPUTS,
    predicate: (m, t) => (m.ndmi_fill < t.ndmi_dry || m.msi_fill > t.msi_dry) && m.precip_7d < t.precip_low7,
    evidence: (m) => describe(m, DROUGHT_INPUTS),
    intensity: [
      { metric: "ndmi_fill", distance: (m, t) => t.ndmi_dry - m.ndmi_fill },
      { metric: "msi_fill", distance: (m, t) => m.msi_fill - t.msi_dry },
    ],
  },
  {
    name: "waterlogging",
    inputs: WATERLOGGING_INPUTS,
    predicate: (m, t) =>
      m.ndmi_fill > t.ndmi_wet &&
      m.precip_7d > t.precip_high7 &&
      (m.evi_fill < t.evi_crop || m.ndvi_fill < t.ndvi_crop),
    evidence: (m) => describe(m, WATERLOGGING_INPUTS),
    intensity: [{ metric: "ndmi_fill", distance: (m, t) => m.ndmi_fill - t.ndmi_wet }],
  },
  {
    name: "heat_stress",
    inputs: HEAT_INPUTS,
    predicate: (m, t) =>
      m.tmean_7d >= t.heat_tmean7 &&
      m.rh_7d <= t.heat_rh7 &&
      (m.evi_fill < t.evi_crop || m.ndvi_slope7 <= t.slope7_drop),
    evidence: (m) => describe(m, HEAT_INPUTS),
    intensity: [{ metric: "tmean_7d", distance: (m, t) => m.tmean_7d - t.heat_tmean7 }],
  },
  {
    name: "cold_stress",
    inputs: COLD_INPUTS,
    predicate: (m, t) =>
      m.tmin_7d <= t.cold_tmin7 &&
      (m.evi_fill < COLD_EVI_WEAK || m.ndvi_fill < COLD_NDVI_WEAK || m.ndvi_slope7 <= t.slope7_drop),
    evidence: (m) => describe(m, COLD_INPUTS),
    intensity: [{ metric: "tmin_7d", distance: (m, t) => t.cold_tmin7 - m.tmin_7d }],
  },
  {
    // Low chlorophyll only counts under adequate moisture; otherwise it is drought evidence.
    name: "nutrient_or_pest",
    inputs: NUTRIENT_INPUTS,
    predicate: (m, t) => (m.ndre_fill < t.ndre_low || m.gndvi_fill < t.gndvi_low) && m.ndmi_fill >= t.ndmi_dry,
    evidence: (m) => describe(m, NUTRIENT_INPUTS),
    intensity: [
      { metric: "ndre_fill", distance: (m, t) => t.ndre_low - m.ndre_fill },
      { metric: "gndvi_fill", distance: (m, t) => t.gndvi_low - m.gndvi_fill },
    ],
  },
];

const RULES_BY_NAME = new Map<RuleName, RuleDescriptor>(RULES.map((rule) => [rule.name, rule]));

export function getRule(name: RuleName): RuleDescriptor {
  const rule = RULES_BY_NAME.get(name);
  if (!rule) {
    throw new Error(`Unknown rule: ${name}`);
  }
  return rule;
}

type Triggered = {
  rule: RuleDescriptor;
  evidence: string;
};

export function evaluateRules(m: DayMetrics, t: Thresholds, rules: readonly RuleDescriptor[] = RULES): Triggered[] {
  if (!canopyPresent(m, t)) return [];
  const triggered: Triggered[] = [];
  for (const rule of rules) {
    if (!rule.inputs.every((key) => Number.isFinite(m[key]))) continue;
    if (!rule.predicate(m, t)) continue;
    triggered.push({ rule, evidence: rule.evidence(m) });
  }
  return triggered;
}

/** Zero triggers is no alert, one is that rule's event, several collapse into `composite`. */
export function resolveTriggers(date: string, triggered: Triggered[]): AlertRecord | null {
  if (triggered.length === 0) return null;
  const names = triggered.map((t) => t.rule.name);
  const eventType: EventType = triggered.length === 1 ? names[0] : "composite";
  return {
    date,
    event_type: eventType,
    reason: `${names.join("+")}: ${triggered.map((t) => t.evidence).join("; ")}`,
    rules: names,
  };
}

export function classifyDay(
  record: DailyRecord,
  t: Thresholds,
  rules: readonly RuleDescriptor[] = RULES
): AlertRecord | null {
  return resolveTriggers(record.date, evaluateRules(readMetrics(record), t, rules));
}

/**
 * Classify every eligible day. The raw pass only requires `qc_ok`; with `applyGating` a day
 * must also carry `allow_alert`.
 */
export function classifyAlerts(
  records: DailyRecord[],
  debug: DebugRecord[],
  t: Thresholds,
  applyGating: boolean
): AlertRecord[] {
  const alerts: AlertRecord[] = [];
  records.forEach((record, i) => {
    const day = debug[i];
    const eligible = applyGating ? day.allow_alert : day.qc_ok;
    if (!eligible) return;
    const alert = classifyDay(record, t);
    if (alert) alerts.push(alert);
  });
  return alerts;
}

/** Largest finite threshold distance over the given rules' intensity terms; first term wins ties. */
export function computeIntensity(m: DayMetrics, t: Thresholds, rules: readonly RuleName[]): Intensity | null {
  let best: Intensity | null = null;
  for (const name of rules) {
    for (const term of getRule(name).intensity) {
      if (!Number.isFinite(m[term.metric])) continue;
      const value = term.distance(m, t);
      if (best === null || value > best.value) {
        best = { value, metric: term.metric };
      }
    }
  }
  return best;
}
