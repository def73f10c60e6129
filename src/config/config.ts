import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { buildEngineConfig, THRESHOLD_KEYS, type EngineConfigOverrides } from "../engine/defaults";
import { parseIsoDate } from "../engine/dates";
import { ConfigError, EngineSchemaError } from "../engine/errors";
import {
  isGatingMode,
  isIndicator,
  isRecord,
  isSupportPick,
  isWeatherAggregate,
  isWindowMode,
  SUPPORT_PICKS,
  validateEngineConfig,
  WINDOW_MODES,
} from "../engine/validation";
import { GATING_MODES } from "../engine/gating";
import type { EngineConfig, Thresholds } from "../engine/types";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "../infra/logger";

export const DEFAULT_CONFIG_PATH = path.join("config", "config.yml");

export type PeriodConfig = {
  dataStart: string;
  dataEnd: string;
  reportStart: string;
  reportEnd: string;
};

export type OutputFiles = {
  debug: string;
  alertsRaw: string;
  alertsGated: string;
  events: string;
};

export type AppConfig = {
  configPath: string;
  rootDir: string;
  paths: {
    merged: string;
    processedDir: string;
  };
  period: PeriodConfig;
  outputs: OutputFiles;
  engine: EngineConfig;
  logging: {
    level: LogLevel;
  };
};

const DEFAULT_OUTFILES = {
  outfile_debug: "02_rs_debug.csv",
  outfile_raw: "03_alerts_raw.csv",
  outfile: "04_alerts_gated.csv",
  outfile_merged: "05_events.csv",
} as const;

/** Resolve ${VAR} and ${VAR:-default} from process.env */
export function resolveEnv(value: string): string {
  return value.replace(/\$\{(\w+)(?::-([^}]*))?\}/g, (_, key: string, def: string | undefined) => {
    const v = process.env[key];
    return v !== undefined && v !== "" ? v : (def ?? "");
  });
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = root[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(key, "must be a mapping");
  }
  return value;
}

function asNonEmptyString(value: unknown, field: string): string {
  if (typeof value !== "string" || resolveEnv(value).trim().length === 0) {
    throw new ConfigError(field, "must be a non-empty string");
  }
  return resolveEnv(value).trim();
}

function asOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  return asNonEmptyString(value, field);
}

function asOptionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  const parsed = typeof value === "string" ? Number(resolveEnv(value)) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    throw new ConfigError(field, "must be a finite number");
  }
  return parsed;
}

function asOptionalEnum<T extends string>(
  value: unknown,
  field: string,
  guard: (v: unknown) => v is T,
  allowed: readonly T[]
): T | undefined {
  if (value === undefined || value === null) return undefined;
  if (!guard(value)) {
    throw new ConfigError(field, `must be one of ${allowed.join(", ")} (got ${JSON.stringify(value)})`);
  }
  return value;
}

function asOptionalList<T>(value: unknown, field: string, guard: (v: unknown) => v is T): T[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every(guard)) {
    throw new ConfigError(field, "has an unsupported entry");
  }
  return [...value];
}

function isMonth(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 12;
}

function asIsoDate(value: unknown, field: string): string {
  const raw = value instanceof Date ? value.toISOString().slice(0, 10) : asNonEmptyString(value, field);
  try {
    return parseIsoDate(raw);
  } catch (err) {
    if (err instanceof EngineSchemaError) {
      throw new ConfigError(field, `must be an ISO calendar date (got ${raw})`);
    }
    throw err;
  }
}

/**
 * Data range is required; the report range defaults to it and must sit inside it.
 * `start_date`/`end_date` are accepted as older names for the data range.
 */
export function parsePeriod(raw: Record<string, unknown>): PeriodConfig {
  const dataStartRaw = raw.data_start ?? raw.start_date;
  const dataEndRaw = raw.data_end ?? raw.end_date;
  if (!dataStartRaw || !dataEndRaw) {
    throw new ConfigError("period", "must set data_start and data_end (or start_date/end_date)");
  }
  const dataStart = asIsoDate(dataStartRaw, "period.data_start");
  const dataEnd = asIsoDate(dataEndRaw, "period.data_end");
  const reportStart = raw.report_start ? asIsoDate(raw.report_start, "period.report_start") : dataStart;
  const reportEnd = raw.report_end ? asIsoDate(raw.report_end, "period.report_end") : dataEnd;

  if (dataStart > dataEnd) {
    throw new ConfigError("period.data_start", "must be <= period.data_end");
  }
  if (reportStart > reportEnd) {
    throw new ConfigError("period.report_start", "must be <= period.report_end");
  }
  if (reportStart < dataStart || reportEnd > dataEnd) {
    throw new ConfigError("period.report_start", "report range must be within the data range");
  }
  return { dataStart, dataEnd, reportStart, reportEnd };
}

function parseThresholds(raw: Record<string, unknown>): Partial<Thresholds> {
  const thresholds: Partial<Thresholds> = {};
  for (const key of THRESHOLD_KEYS) {
    const value = asOptionalNumber(raw[key], `composite_alerts.${key}`);
    if (value !== undefined) thresholds[key] = value;
  }
  return thresholds;
}

export function parseEngineOverrides(root: Record<string, unknown>): EngineConfigOverrides {
  const alerts = section(root, "composite_alerts");
  const rs = section(root, "remote_sensing");
  const gating = section(root, "gating");
  const qc = section(root, "qc");

  return {
    thresholds: parseThresholds(alerts),
    window: {
      window_half_days: asOptionalNumber(rs.window_half_days, "remote_sensing.window_half_days"),
      window_mode: asOptionalEnum(rs.window_mode, "remote_sensing.window_mode", isWindowMode, WINDOW_MODES),
      support_pick: asOptionalEnum(rs.support_pick, "remote_sensing.support_pick", isSupportPick, SUPPORT_PICKS),
    },
    gating: {
      mode: asOptionalEnum(gating.mode, "gating.mode", isGatingMode, GATING_MODES),
      months: asOptionalList(gating.months, "gating.months", isMonth),
      canopy_obs_min: asOptionalNumber(gating.canopy_obs_min, "gating.canopy_obs_min"),
      canopy_ndvi_min: asOptionalNumber(gating.canopy_ndvi_min, "gating.canopy_ndvi_min"),
      canopy_evi_min: asOptionalNumber(gating.canopy_evi_min, "gating.canopy_evi_min"),
    },
    qc: {
      required_weather: asOptionalList(qc.required_weather, "qc.required_weather", isWeatherAggregate),
      required_indices: asOptionalList(qc.required_indices, "qc.required_indices", isIndicator),
    },
  };
}

export function parseAppConfig(raw: unknown, configPath: string, rootDir = process.cwd()): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("(root)", "expected top-level mapping");
  }
  const paths = section(raw, "paths");
  const alerts = section(raw, "composite_alerts");
  const logging = section(raw, "logging");

  const resolve = (p: string, base: string) => (path.isAbsolute(p) ? p : path.resolve(base, p));
  const processedDir = resolve(
    asOptionalString(paths.data_processed, "paths.data_processed") ?? "data/processed",
    rootDir
  );
  const merged = resolve(
    asOptionalString(paths.merged, "paths.merged") ?? path.join(processedDir, "01_merged.csv"),
    rootDir
  );
  const outfile = (key: keyof typeof DEFAULT_OUTFILES) =>
    resolve(asOptionalString(alerts[key], `composite_alerts.${key}`) ?? DEFAULT_OUTFILES[key], processedDir);

  const engine = validateEngineConfig(buildEngineConfig(parseEngineOverrides(raw)));

  const levelRaw = asOptionalString(logging.level, "logging.level")?.toLowerCase() ?? "info";
  if (!isLogLevel(levelRaw)) {
    throw new ConfigError("logging.level", `must be one of ${LOG_LEVELS.join(", ")}`);
  }

  return {
    configPath,
    rootDir,
    paths: { merged, processedDir },
    period: parsePeriod(section(raw, "period")),
    outputs: {
      debug: outfile("outfile_debug"),
      alertsRaw: outfile("outfile_raw"),
      alertsGated: outfile("outfile"),
      events: outfile("outfile_merged"),
    },
    engine,
    logging: { level: levelRaw },
  };
}

export function resolveConfigPath(explicit?: string): string {
  const rawPath = explicit?.trim() || process.env.CROP_ALERTS_CONFIG_PATH?.trim() || DEFAULT_CONFIG_PATH;
  return path.isAbsolute(rawPath) ? rawPath : path.resolve(process.cwd(), rawPath);
}

export function loadAppConfig(explicitPath?: string): AppConfig {
  const configPath = resolveConfigPath(explicitPath);
  if (!fs.existsSync(configPath)) {
    throw new ConfigError("(file)", `not found at ${configPath}`);
  }
  const parsed: unknown = YAML.parse(fs.readFileSync(configPath, "utf8"));
  return parseAppConfig(parsed, configPath);
}
