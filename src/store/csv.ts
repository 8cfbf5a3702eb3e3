import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import type { RowParseWarning } from "../errors.ts";
import type { Task } from "./types.ts";

// ── Column layout ────────────────────────────────────

export const CSV_COLUMNS = [
  "id",
  "date",
  "duration",
  "name",
  "description",
  "status",
  "priority",
  "tags",
  "created_at",
  "updated_at",
] as const;

type RecordField =
  | "id" | "date" | "duration" | "name" | "description"
  | "status" | "priority" | "tags" | "createdAt" | "updatedAt";

/** Untyped field values from one data row, keyed by Task field. */
export type RawTaskRecord = Partial<Record<RecordField, string>>;

// Header names from older files map onto current fields
const HEADER_FIELDS: Record<string, RecordField> = {
  id: "id",
  date: "date",
  duration: "duration",
  hour: "duration",
  name: "name",
  task: "name",
  title: "name",
  description: "description",
  status: "status",
  priority: "priority",
  tags: "tags",
  created_at: "createdAt",
  createdat: "createdAt",
  updated_at: "updatedAt",
  updatedat: "updatedAt",
};

const TAG_DELIMITER = ",";

const csvRecordsSchema = z.array(z.array(z.string()));

// ── Encode ───────────────────────────────────────────

export function encodeTasks(tasks: readonly Task[]): string {
  const rows = tasks.map((t) => [
    t.id,
    t.date,
    t.duration,
    t.name,
    t.description,
    t.status,
    t.priority,
    t.tags.join(TAG_DELIMITER),
    t.createdAt,
    t.updatedAt,
  ]);
  return stringify([[...CSV_COLUMNS], ...rows]);
}

// ── Decode ───────────────────────────────────────────

export interface DecodedRow {
  /** 1-based data row, header excluded */
  row: number;
  record: RawTaskRecord;
}

export interface DecodeResult {
  rows: DecodedRow[];
  warnings: RowParseWarning[];
}

/**
 * Splits CSV text into per-row records. Rows whose column count differs from
 * the header are reported and left out; field validation is the caller's job.
 */
export function decodeRows(text: string, source: string): DecodeResult {
  const records = csvRecordsSchema.parse(
    parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    }),
  );

  const [header, ...data] = records;
  if (!header) return { rows: [], warnings: [] };

  const fields = header.map((name) => HEADER_FIELDS[name.trim().toLowerCase()]);
  const rows: DecodedRow[] = [];
  const warnings: RowParseWarning[] = [];

  data.forEach((cells, i) => {
    const row = i + 1;
    if (cells.length !== header.length) {
      warnings.push({
        kind: "row",
        source,
        row,
        message: `Row ${row}: expected ${header.length} columns, found ${cells.length}`,
      });
      return;
    }
    const record: RawTaskRecord = {};
    cells.forEach((cell, col) => {
      const field = fields[col];
      if (field) record[field] = cell;
    });
    rows.push({ row, record });
  });

  return { rows, warnings };
}

/**
 * Maps a JSON import entry's keys onto Task fields using the same aliases as
 * CSV headers. Numeric ids (row numbers in older exports) are dropped.
 */
export function recordFromObject(entry: unknown): unknown {
  if (!entry || typeof entry !== "object" || Array.isArray(entry)) return entry;
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    const field = HEADER_FIELDS[key.trim().toLowerCase()];
    if (!field) continue;
    if (field === "id" && typeof value !== "string") continue;
    record[field] = value;
  }
  return record;
}
