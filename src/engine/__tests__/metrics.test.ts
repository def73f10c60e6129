import { describe, expect, it } from "vitest";
import { EngineSchemaError } from "../errors";
import { isRealObsDay, resolveMetrics } from "../metrics";
import { healthy, recordFrom, tableFrom } from "./helpers";

function days(count: number, values: (i: number) => Record<string, number | null>) {
  return Array.from({ length: count }, (_, i) => ({
    date: `2025-05-${String(i + 1).padStart(2, "0")}`,
    values: values(i),
  }));
}

describe("resolveMetrics columns", () => {
  it("falls back to *_mean for both obs and fill", () => {
    const record = recordFrom({ ndvi_mean: 0.6 });
    expect(record.indices.ndvi).toEqual({ obs: 0.6, fill: 0.6 });
    expect(record.indices.evi).toEqual({ obs: null, fill: null });
  });

  it("prefers *_mean_daily over *_mean for the filled value", () => {
    const record = recordFrom({ ndmi_mean: 0.3, ndmi_mean_daily: 0.25 });
    expect(record.indices.ndmi).toEqual({ obs: 0.3, fill: 0.25 });
  });

  it("prefers explicit obs/fill columns", () => {
    const record = recordFrom({ evi_obs: null, evi_fill: 0.4, evi_mean: 0.9 });
    expect(record.indices.evi).toEqual({ obs: null, fill: 0.4 });
  });

  it("does not modify the input table", () => {
    const table = tableFrom([{ date: "2025-05-01", values: healthy() }]);
    const before = JSON.stringify(table);
    resolveMetrics(table);
    expect(JSON.stringify(table)).toBe(before);
  });
});

describe("resolveMetrics weather derivation", () => {
  it("sums precipitation over the trailing seven rows", () => {
    const records = resolveMetrics(tableFrom(days(8, (i) => ({ precipitation_sum: i + 1 }))));
    expect(records.slice(0, 6).map((r) => r.weather.precip_7d)).toEqual([null, null, null, null, null, null]);
    expect(records[6].weather.precip_7d).toBe(28);
    expect(records[7].weather.precip_7d).toBe(35);
  });

  it("averages tmean from daily max and min when tmean is absent", () => {
    const records = resolveMetrics(
      tableFrom(days(7, () => ({ temperature_2m_max: 20, temperature_2m_min: 10 })))
    );
    expect(records[6].weather.tmean_7d).toBe(15);
    expect(records[6].weather.tmin_7d).toBe(10);
    expect(records[6].weather.rh_7d).toBeNull();
  });

  it("leaves the aggregate null when the window holds a missing day", () => {
    const records = resolveMetrics(
      tableFrom(days(8, (i) => ({ precipitation_sum: i === 2 ? null : 1 })))
    );
    expect(records[6].weather.precip_7d).toBeNull();
    expect(records[7].weather.precip_7d).toBeNull();
  });

  it("keeps a provided aggregate column as is", () => {
    const record = recordFrom({ precip_7d: 4.5, precipitation_sum: 100 });
    expect(record.weather.precip_7d).toBe(4.5);
  });
});

describe("resolveMetrics ndvi_slope7", () => {
  it("differences ndvi_fill against the value seven days earlier", () => {
    const records = resolveMetrics(tableFrom(days(8, (i) => ({ ndvi_fill: i === 7 ? 0.6 : 0.5 }))));
    expect(records[6].ndvi_slope7).toBeNull();
    expect(records[7].ndvi_slope7).toBeCloseTo(0.1, 10);
  });

  it("is null when the day seven days earlier is not in the table", () => {
    const records = resolveMetrics(
      tableFrom([
        { date: "2025-05-01", values: { ndvi_fill: 0.5 } },
        { date: "2025-05-09", values: { ndvi_fill: 0.6 } },
      ])
    );
    expect(records.map((r) => r.ndvi_slope7)).toEqual([null, null]);
  });
});

describe("resolveMetrics schema checks", () => {
  it("rejects a table without a date column", () => {
    expect(() => resolveMetrics({ columns: ["ndvi_obs"], rows: [] })).toThrow(EngineSchemaError);
  });

  it("rejects unparseable dates", () => {
    expect(() => resolveMetrics(tableFrom([{ date: "05/01/2025", values: {} }]))).toThrow(EngineSchemaError);
  });

  it("rejects duplicate and descending dates", () => {
    const duplicate = tableFrom([
      { date: "2025-05-01", values: {} },
      { date: "2025-05-01", values: {} },
    ]);
    const descending = tableFrom([
      { date: "2025-05-02", values: {} },
      { date: "2025-05-01", values: {} },
    ]);
    expect(() => resolveMetrics(duplicate)).toThrow(EngineSchemaError);
    expect(() => resolveMetrics(descending)).toThrow(EngineSchemaError);
  });

  it("normalizes timestamps to their date part", () => {
    const [record] = resolveMetrics(tableFrom([{ date: "2025-05-01T00:00:00Z", values: {} }]));
    expect(record.date).toBe("2025-05-01");
  });
});

describe("isRealObsDay", () => {
  it("needs at least one finite observed indicator", () => {
    expect(isRealObsDay(recordFrom({ ndvi_obs: null, evi_obs: 0.4 }))).toBe(true);
    expect(isRealObsDay(recordFrom({ ndvi_obs: null, ndvi_fill: 0.7 }))).toBe(false);
    expect(isRealObsDay(recordFrom({ ndvi_obs: Number.POSITIVE_INFINITY }))).toBe(false);
  });
});
