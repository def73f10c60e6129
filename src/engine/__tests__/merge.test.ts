import { describe, expect, it } from "vitest";
import { DEFAULT_THRESHOLDS } from "../defaults";
import { bucketAlerts, mergeEvents } from "../merge";
import { alertOn, healthy, recordFrom } from "./helpers";

const RECORDS = [
  recordFrom(healthy({ ndmi_fill: 0.15, precip_7d: 5 }), "2025-06-01"),
  recordFrom(healthy({ ndmi_fill: 0.05, precip_7d: 5 }), "2025-06-02"),
  recordFrom(healthy({ ndmi_fill: 0.1, precip_7d: 5 }), "2025-06-04"),
];

const DROUGHT_RUN = [
  alertOn("2025-06-01", ["drought"], "drought: a"),
  alertOn("2025-06-02", ["drought"], "drought: b"),
  alertOn("2025-06-04", ["drought"], "drought: a"),
];

describe("bucketAlerts", () => {
  it("bridges a one-day hole with gap 1", () => {
    expect(bucketAlerts(DROUGHT_RUN, 1).map((b) => b.length)).toEqual([3]);
  });

  it("splits on the same hole with gap 0", () => {
    expect(bucketAlerts(DROUGHT_RUN, 0).map((b) => b.map((a) => a.date))).toEqual([
      ["2025-06-01", "2025-06-02"],
      ["2025-06-04"],
    ]);
  });
});

describe("mergeEvents", () => {
  it("merges a run into one event with its peak", () => {
    const [event, ...rest] = mergeEvents(DROUGHT_RUN, RECORDS, DEFAULT_THRESHOLDS);
    expect(rest).toEqual([]);
    expect(event).toMatchObject({
      event_type: "drought",
      start_date: "2025-06-01",
      end_date: "2025-06-04",
      duration_days: 4,
      peak_date: "2025-06-02",
      peak_metric: "ndmi_fill",
      reason_summary: "drought: a | drought: b",
    });
    expect(event.peak_value).toBeCloseTo(0.15, 10);
  });

  it("splits runs when merge_gap_days is 0", () => {
    const events = mergeEvents(DROUGHT_RUN, RECORDS, { ...DEFAULT_THRESHOLDS, merge_gap_days: 0 });
    expect(events.map((e) => [e.start_date, e.end_date, e.duration_days, e.peak_date])).toEqual([
      ["2025-06-01", "2025-06-02", 2, "2025-06-02"],
      ["2025-06-04", "2025-06-04", 1, "2025-06-04"],
    ]);
  });

  it("never merges composite days into a single-rule run", () => {
    const alerts = [...DROUGHT_RUN, alertOn("2025-06-03", ["drought", "heat_stress"])];
    const events = mergeEvents(alerts, RECORDS, DEFAULT_THRESHOLDS);
    expect(events.map((e) => [e.event_type, e.start_date, e.end_date])).toEqual([
      ["drought", "2025-06-01", "2025-06-04"],
      ["composite", "2025-06-03", "2025-06-03"],
    ]);
  });

  it("leaves the peak value empty when no intensity can be computed", () => {
    const [event] = mergeEvents([alertOn("2025-06-03", ["drought", "heat_stress"])], RECORDS, DEFAULT_THRESHOLDS);
    expect(event).toMatchObject({ peak_date: "2025-06-03", peak_value: null, peak_metric: null });
  });

  it("orders events by start date, then event type", () => {
    const alerts = [alertOn("2025-06-01", ["drought"]), alertOn("2025-06-01", ["drought", "heat_stress"])];
    expect(mergeEvents(alerts, RECORDS, DEFAULT_THRESHOLDS).map((e) => e.event_type)).toEqual([
      "composite",
      "drought",
    ]);
  });

  it("keeps at most two distinct reasons", () => {
    const alerts = [
      alertOn("2025-06-01", ["drought"], "drought: a"),
      alertOn("2025-06-02", ["drought"], "drought: b"),
      alertOn("2025-06-03", ["drought"], "drought: c"),
    ];
    const [event] = mergeEvents(alerts, RECORDS, DEFAULT_THRESHOLDS);
    expect(event.reason_summary).toBe("drought: a | drought: b");
  });
});
