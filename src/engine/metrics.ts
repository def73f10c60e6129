import { parseIsoDate, shiftDate, toDayNumber } from "./dates";
import { EngineSchemaError } from "./errors";
import {
  INDICATORS,
  type Cell,
  type DailyRecord,
  type Indicator,
  type IndicatorPair,
  type RawRow,
  type RawTable,
  type WeatherAggregate,
} from "./types";

const ROLLING_WINDOW = 7;
const SLOPE_LAG_DAYS = 7;

type IndicatorSources = {
  obs: string[];
  fill: string[];
};

export function byIndicator<T>(fn: (name: Indicator) => T): Record<Indicator, T> {
  return {
    ndvi: fn("ndvi"),
    evi: fn("evi"),
    ndmi: fn("ndmi"),
    ndre: fn("ndre"),
    gndvi: fn("gndvi"),
    msi: fn("msi"),
  };
}

export function byWeather<T>(fn: (name: WeatherAggregate) => T): Record<WeatherAggregate, T> {
  return {
    precip_7d: fn("precip_7d"),
    tmean_7d: fn("tmean_7d"),
    rh_7d: fn("rh_7d"),
    tmin_7d: fn("tmin_7d"),
  };
}

/** Accepted source columns per canonical indicator column, first present wins. */
export const INDICATOR_SOURCES: Record<Indicator, IndicatorSources> = byIndicator((name) => ({
  obs: [`${name}_obs`, `${name}_mean`],
  fill: [`${name}_fill`, `${name}_mean_daily`, `${name}_mean`],
}));

type DailySource = (row: RawRow) => Cell;
type Reducer = "sum" | "mean";

function column(name: string): DailySource {
  return (row) => row.values[name] ?? null;
}

function dailyTmean(row: RawRow): Cell {
  const tmean = row.values.tmean;
  if (tmean !== undefined && tmean !== null) return tmean;
  const tmax = row.values.temperature_2m_max;
  const tmin = row.values.temperature_2m_min;
  if (isFiniteCell(tmax) && isFiniteCell(tmin)) return (tmax + tmin) / 2;
  return null;
}

type WeatherDerivation = {
  requires: string[][];
  source: DailySource;
  reduce: Reducer;
};

/** Daily columns a missing 7-day aggregate can be rebuilt from; any one `requires` group suffices. */
const WEATHER_DERIVATIONS: Record<WeatherAggregate, WeatherDerivation> = {
  precip_7d: { requires: [["precipitation_sum"]], source: column("precipitation_sum"), reduce: "sum" },
  tmean_7d: {
    requires: [["tmean"], ["temperature_2m_max", "temperature_2m_min"]],
    source: dailyTmean,
    reduce: "mean",
  },
  rh_7d: {
    requires: [["relative_humidity_2m_mean"]],
    source: column("relative_humidity_2m_mean"),
    reduce: "mean",
  },
  tmin_7d: { requires: [["temperature_2m_min"]], source: column("temperature_2m_min"), reduce: "mean" },
};

export function isFiniteCell(value: Cell | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function firstPresent(columns: Set<string>, candidates: string[]): string | null {
  return candidates.find((c) => columns.has(c)) ?? null;
}

/**
 * Fail fast on tables the engine cannot scan in order: no `date` column, an unparseable
 * date, or dates that are not strictly increasing.
 */
export function assertDailyTable(table: RawTable): string[] {
  if (!table.columns.includes("date")) {
    throw new EngineSchemaError('Input table must contain a "date" column');
  }
  const dates: string[] = [];
  let prev: number | null = null;
  for (const row of table.rows) {
    const date = parseIsoDate(row.date);
    const day = toDayNumber(date);
    if (prev !== null && day <= prev) {
      throw new EngineSchemaError(
        `Dates must be strictly increasing with one row per date; found ${date} after ${dates[dates.length - 1]}`
      );
    }
    dates.push(date);
    prev = day;
  }
  return dates;
}

function trailingReduce(series: Cell[], reduce: Reducer): Cell[] {
  return series.map((_, i) => {
    if (i + 1 < ROLLING_WINDOW) return null;
    const window = series.slice(i + 1 - ROLLING_WINDOW, i + 1);
    if (!window.every(isFiniteCell)) return null;
    const total = window.reduce((sum, v) => sum + v, 0);
    return reduce === "sum" ? total : total / ROLLING_WINDOW;
  });
}

function resolveWeather(table: RawTable, columns: Set<string>): Record<WeatherAggregate, Cell[]> {
  return byWeather((name) => {
    if (columns.has(name)) {
      return table.rows.map((row) => row.values[name] ?? null);
    }
    const derivation = WEATHER_DERIVATIONS[name];
    const derivable = derivation.requires.some((group) => group.every((c) => columns.has(c)));
    return derivable
      ? trailingReduce(table.rows.map(derivation.source), derivation.reduce)
      : table.rows.map(() => null);
  });
}

function resolveSlope(dates: string[], ndviFill: Cell[]): Cell[] {
  const byDate = new Map<string, Cell>();
  dates.forEach((date, i) => byDate.set(date, ndviFill[i]));
  return dates.map((date, i) => {
    const today = ndviFill[i];
    const lagged = byDate.get(shiftDate(date, -SLOPE_LAG_DAYS));
    if (!isFiniteCell(today) || !isFiniteCell(lagged)) return null;
    return today - lagged;
  });
}

/**
 * Resolve the input table into the engine's fixed schema: an obs/fill pair for every
 * indicator, the four 7-day weather aggregates and `ndvi_slope7`. Returns new records;
 * the input table is left untouched.
 */
export function resolveMetrics(table: RawTable): DailyRecord[] {
  const dates = assertDailyTable(table);
  const columns = new Set(table.columns);

  const pairColumns = byIndicator((name) => ({
    obs: firstPresent(columns, INDICATOR_SOURCES[name].obs),
    fill: firstPresent(columns, INDICATOR_SOURCES[name].fill),
  }));
  const cell = (row: RawRow, name: string | null): Cell => (name ? row.values[name] ?? null : null);

  const weather = resolveWeather(table, columns);
  const slope = columns.has("ndvi_slope7")
    ? table.rows.map((row) => cell(row, "ndvi_slope7"))
    : resolveSlope(
        dates,
        table.rows.map((row) => cell(row, pairColumns.ndvi.fill))
      );

  return table.rows.map((row, i) => ({
    date: dates[i],
    indices: byIndicator(
      (name): IndicatorPair => ({
        obs: cell(row, pairColumns[name].obs),
        fill: cell(row, pairColumns[name].fill),
      })
    ),
    weather: byWeather((name) => weather[name][i]),
    ndvi_slope7: slope[i],
  }));
}

/** A real observation day has at least one finite observed indicator. */
export function isRealObsDay(record: DailyRecord): boolean {
  return INDICATORS.some((name) => isFiniteCell(record.indices[name].obs));
}
