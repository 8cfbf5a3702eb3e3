import { describe, expect, it } from "vitest";
import { decodeRows, encodeTasks, recordFromObject } from "./csv.ts";
import { createTask, parseTaskRecord } from "./schema.ts";
import type { TaskContext } from "./types.ts";

const ctx: TaskContext = {
  calendar: "gregorian",
  defaultDuration: "1h",
  now: () => new Date("2024-05-01T08:00:00.000Z"),
  newId: () => "00000000-0000-4000-8000-000000000001",
};

describe("encodeTasks", () => {
  it("writes the header even for an empty collection", () => {
    expect(encodeTasks([])).toBe("id,date,duration,name,description,status,priority,tags,created_at,updated_at\n");
  });

  it("quotes fields with commas, quotes and newlines", () => {
    const task = createTask({ name: 'Review "draft", part 2', date: "2024-05-01", description: "one\ntwo" }, ctx);
    const [, line] = encodeTasks([task]).split("\n", 2);
    expect(line).toBe(
      '00000000-0000-4000-8000-000000000001,2024-05-01,1h,"Review ""draft"", part 2","one',
    );
  });
});

describe("decodeRows", () => {
  it("reads back what was written, Persian text and tags included", () => {
    const task = createTask(
      {
        name: "جلسه با تیم",
        date: "2024-05-01",
        duration: "1h 30min",
        description: 'notes, "quoted"\nsecond line',
        status: "pending",
        priority: "high",
        tags: ["کار", "urgent"],
      },
      ctx,
    );

    const { rows, warnings } = decodeRows(encodeTasks([task]), "tasks.csv");
    expect(warnings).toEqual([]);
    expect(rows).toHaveLength(1);
    expect(rows[0]?.record.tags).toBe("کار,urgent");
    expect(parseTaskRecord(rows[0]?.record, ctx)).toEqual(task);
  });

  it("reports rows with the wrong column count and keeps the rest", () => {
    const text = "id,date,name\n1,2024-01-01,a\n2,2024-01-02\n3,2024-01-03,c\n";
    const { rows, warnings } = decodeRows(text, "f.csv");

    expect(rows.map((r) => r.row)).toEqual([1, 3]);
    expect(warnings).toEqual([
      { kind: "row", source: "f.csv", row: 2, message: "Row 2: expected 3 columns, found 2" },
    ]);
  });

  it("maps headers from older files", () => {
    const { rows } = decodeRows("Date,Hour,Task\n2024-01-01,2h,Old entry\n", "old.csv");
    expect(rows[0]?.record).toEqual({ date: "2024-01-01", duration: "2h", name: "Old entry" });
  });

  it("strips a byte order mark", () => {
    const { rows } = decodeRows("\uFEFFdate,name\n2024-01-01,x\n", "bom.csv");
    expect(rows[0]?.record).toEqual({ date: "2024-01-01", name: "x" });
  });

  it("returns nothing for empty input", () => {
    expect(decodeRows("", "empty.csv")).toEqual({ rows: [], warnings: [] });
  });
});

describe("recordFromObject", () => {
  it("maps aliases and drops numeric ids and unknown keys", () => {
    expect(recordFromObject({ Title: "x", id: 3, extra: 1, created_at: "2024-01-01T00:00:00Z" })).toEqual({
      name: "x",
      createdAt: "2024-01-01T00:00:00Z",
    });
  });

  it("passes non-objects through for validation to reject", () => {
    expect(recordFromObject("row")).toBe("row");
  });
});
