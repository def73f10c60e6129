import { logger } from "../infra/logger";
import { ConfigError, EngineSchemaError, EngineStageError } from "./errors";
import { evaluateGating } from "./gating";
import { mergeEvents } from "./merge";
import { isRealObsDay, resolveMetrics } from "./metrics";
import { evaluateQc } from "./qc";
import { classifyAlerts } from "./rules";
import { resolveSupportWindows } from "./supportWindow";
import type { DebugRecord, EngineConfig, EngineResult, RawTable } from "./types";
import { validateEngineConfig } from "./validation";

export const ENGINE_STAGES = [
  "RESOLVE_METRICS",
  "SUPPORT_WINDOW",
  "QC",
  "GATING",
  "CLASSIFY_RAW",
  "CLASSIFY_GATED",
  "MERGE_EVENTS",
] as const;
export type EngineStage = (typeof ENGINE_STAGES)[number];

function runStage<T>(stage: EngineStage, fn: () => T, count: (value: T) => number): T {
  const startedAt = Date.now();
  try {
    const value = fn();
    logger.debug("engine stage done", { stage, rows: count(value), latencyMs: Date.now() - startedAt });
    return value;
  } catch (err) {
    if (err instanceof EngineSchemaError || err instanceof ConfigError) throw err;
    throw new EngineStageError(stage, err instanceof Error ? err.message : String(err), { cause: err });
  }
}

const length = (value: unknown[]) => value.length;

/**
 * Run the composite alert engine over one daily table.
 *
 * Pure with respect to its inputs: the table is not modified and the same table and config
 * always produce the same four outputs. Schema and configuration problems abort the run;
 * per-day data gaps only mark that day's `skip_reason`.
 */
export function runCompositeEngine(table: RawTable, config: EngineConfig): EngineResult {
  validateEngineConfig(config);
  const startedAt = Date.now();

  const records = runStage("RESOLVE_METRICS", () => resolveMetrics(table), length);
  const realObs = records.map(isRealObsDay);
  const dates = records.map((r) => r.date);

  const support = runStage(
    "SUPPORT_WINDOW",
    () =>
      resolveSupportWindows(
        dates,
        dates.filter((_, i) => realObs[i]),
        config.window
      ),
    length
  );
  const qc = runStage(
    "QC",
    () => records.map((record, i) => evaluateQc(record, support[i], config.qc)),
    length
  );
  const gating = runStage("GATING", () => evaluateGating(records, qc, config.gating), length);

  const debug: DebugRecord[] = records.map((record, i) => ({
    date: record.date,
    real_obs_day: realObs[i],
    ...support[i],
    ...qc[i],
    ...gating[i],
  }));

  const alertsRaw = runStage(
    "CLASSIFY_RAW",
    () => classifyAlerts(records, debug, config.thresholds, false),
    length
  );
  const alertsGated = runStage(
    "CLASSIFY_GATED",
    () => classifyAlerts(records, debug, config.thresholds, true),
    length
  );
  const events = runStage(
    "MERGE_EVENTS",
    () => mergeEvents(alertsGated, records, config.thresholds),
    length
  );

  logger.info("composite engine done", {
    days: records.length,
    qcOkDays: qc.filter((q) => q.qc_ok).length,
    allowAlertDays: gating.filter((g) => g.allow_alert).length,
    rawAlerts: alertsRaw.length,
    gatedAlerts: alertsGated.length,
    events: events.length,
    latencyMs: Date.now() - startedAt,
  });

  return { alertsRaw, alertsGated, events, debug };
}
