import { daysBetween } from "./dates";
import { computeIntensity, readMetrics, type DayMetrics } from "./rules";
import type { AlertRecord, DailyRecord, EventType, MergedEvent, Thresholds } from "./types";

const MAX_SUMMARY_REASONS = 2;
const REASON_SEPARATOR = " | ";

/** Split one event type's date-sorted alerts wherever the gap exceeds `mergeGapDays + 1`. */
export function bucketAlerts(alerts: AlertRecord[], mergeGapDays: number): AlertRecord[][] {
  const buckets: AlertRecord[][] = [];
  let current: AlertRecord[] = [];
  for (const alert of alerts) {
    const prev = current[current.length - 1];
    if (prev && daysBetween(prev.date, alert.date) > mergeGapDays + 1) {
      buckets.push(current);
      current = [];
    }
    current.push(alert);
  }
  if (current.length > 0) buckets.push(current);
  return buckets;
}

function summarizeReasons(bucket: AlertRecord[]): string {
  const distinct: string[] = [];
  for (const alert of bucket) {
    if (distinct.length >= MAX_SUMMARY_REASONS) break;
    if (!distinct.includes(alert.reason)) distinct.push(alert.reason);
  }
  return distinct.join(REASON_SEPARATOR);
}

function buildEvent(
  eventType: EventType,
  bucket: AlertRecord[],
  metricsByDate: Map<string, DayMetrics>,
  t: Thresholds
): MergedEvent {
  const first = bucket[0];
  const last = bucket[bucket.length - 1];

  let peak: { date: string; value: number | null; metric: string | null } = {
    date: first.date,
    value: null,
    metric: null,
  };
  for (const alert of bucket) {
    const metrics = metricsByDate.get(alert.date);
    if (!metrics) continue;
    const intensity = computeIntensity(metrics, t, alert.rules);
    if (!intensity) continue;
    if (peak.value === null || intensity.value > peak.value) {
      peak = { date: alert.date, value: intensity.value, metric: intensity.metric };
    }
  }

  return {
    event_type: eventType,
    start_date: first.date,
    end_date: last.date,
    duration_days: daysBetween(first.date, last.date) + 1,
    peak_date: peak.date,
    peak_value: peak.value,
    peak_metric: peak.metric,
    reason_summary: summarizeReasons(bucket),
  };
}

/**
 * Merge gated daily alerts into events. Alerts only merge with alerts of the same
 * `event_type`; a composite day never joins a single-rule run. Events come back sorted by
 * start date, then event type.
 */
export function mergeEvents(
  alerts: AlertRecord[],
  records: DailyRecord[],
  t: Thresholds
): MergedEvent[] {
  const metricsByDate = new Map<string, DayMetrics>();
  for (const record of records) {
    metricsByDate.set(record.date, readMetrics(record));
  }

  const groups = new Map<EventType, AlertRecord[]>();
  for (const alert of alerts) {
    const group = groups.get(alert.event_type) ?? [];
    group.push(alert);
    groups.set(alert.event_type, group);
  }

  const events: MergedEvent[] = [];
  for (const [eventType, group] of groups) {
    const sorted = [...group].sort((a, b) => a.date.localeCompare(b.date));
    for (const bucket of bucketAlerts(sorted, t.merge_gap_days)) {
      events.push(buildEvent(eventType, bucket, metricsByDate, t));
    }
  }

  return events.sort(
    (a, b) => a.start_date.localeCompare(b.start_date) || a.event_type.localeCompare(b.event_type)
  );
}
