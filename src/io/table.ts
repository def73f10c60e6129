import fs from "node:fs";
import { parse } from "csv-parse/sync";
import { EngineSchemaError } from "../engine/errors";
import type { Cell, RawRow, RawTable } from "../engine/types";

const MISSING_TOKENS = new Set(["", "nan", "na", "n/a", "null", "none", "nat"]);
const POSITIVE_INF = new Set(["inf", "+inf", "infinity", "+infinity"]);
const NEGATIVE_INF = new Set(["-inf", "-infinity"]);

/** Parse one numeric cell. Blank and NaN-like tokens are missing; infinities stay non-finite. */
export function parseCell(raw: string): Cell {
  const token = raw.trim().toLowerCase();
  if (MISSING_TOKENS.has(token)) return null;
  if (POSITIVE_INF.has(token)) return Number.POSITIVE_INFINITY;
  if (NEGATIVE_INF.has(token)) return Number.NEGATIVE_INFINITY;
  const value = Number(token);
  return Number.isNaN(value) ? null : value;
}

function isStringGrid(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((c) => typeof c === "string"));
}

/**
 * Parse CSV text into a raw table. Only the header is checked here; date validation and
 * ordering belong to the engine.
 */
export function parseDailyTable(content: string): RawTable {
  const grid: unknown = parse(content, {
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!isStringGrid(grid) || grid.length === 0) {
    throw new EngineSchemaError("Input table is empty or not a CSV grid");
  }

  const [header, ...body] = grid;
  const columns = header.map((c) => c.trim());
  const dateIdx = columns.indexOf("date");
  if (dateIdx < 0) {
    throw new EngineSchemaError('Input table must contain a "date" column');
  }

  const rows: RawRow[] = body.map((cells) => {
    const values: Record<string, Cell> = {};
    columns.forEach((name, i) => {
      if (i === dateIdx) return;
      values[name] = parseCell(cells[i] ?? "");
    });
    return { date: cells[dateIdx] ?? "", values };
  });

  return { columns, rows };
}

export function readDailyTable(filePath: string): RawTable {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Input table not found at ${filePath}`);
  }
  return parseDailyTable(fs.readFileSync(filePath, "utf8"));
}
