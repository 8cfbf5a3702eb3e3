import { afterEach, describe, expect, it } from "vitest";
import { appendFile, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigStore } from "../config/config.ts";
import { IndexOutOfRangeError, StorageIOError, type RowParseWarning } from "../errors.ts";
import { convertDate } from "../utils/date.ts";
import { decodeRows } from "./csv.ts";
import { DataManager } from "./data-manager.ts";

const createdDirs: string[] = [];
const NOW = new Date(2024, 4, 1, 9, 0, 0);

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "daybook-store-test-"));
  createdDirs.push(dir);
  return dir;
}

async function setup(home?: string) {
  const dir = home ?? (await makeTempDir());
  const config = new ConfigStore({ homeDir: dir });
  const warnings: RowParseWarning[] = [];
  const open = () => DataManager.open(config, { now: () => NOW, onWarning: (w) => warnings.push(w) });
  return { dir, config, warnings, open, data: await open() };
}

afterEach(async () => {
  for (const dir of createdDirs.splice(0)) {
    await rm(dir, { recursive: true, force: true });
  }
});

describe("DataManager persistence", () => {
  it("starts empty when the storage file does not exist", async () => {
    const { data } = await setup();
    expect(data.loaded).toBe(true);
    expect(data.list()).toEqual([]);
  });

  it("adds one task to an empty store and writes it to disk", async () => {
    const { data, config, open } = await setup();
    const task = await data.add({ name: "Write report", date: "2024-05-01" });

    const text = await readFile(config.get("storageFile"), "utf8");
    expect(text.split("\n")).toHaveLength(3);
    expect(await data.listBackups()).toEqual([]);

    const reloaded = await open();
    expect(reloaded.list()).toEqual([task]);
  });

  it("reloads Persian text, quotes and tags unchanged", async () => {
    const { data, open } = await setup();
    const task = await data.add({
      name: "بررسی گزارش",
      date: "2024-05-01",
      description: 'said "hi", then left\nnext day',
      tags: "کار, review",
    });

    const reloaded = await open();
    expect(reloaded.get(0)).toEqual(task);
    expect(reloaded.get(0).tags).toEqual(["کار", "review"]);
  });

  it("re-issues duplicate ids found on load", async () => {
    const { config, open } = await setup();
    await writeFile(
      config.get("storageFile"),
      "id,date,name\ndup,2024-05-01,first\ndup,2024-05-02,second\n",
      "utf8",
    );

    const tasks = (await open()).list();
    expect(tasks.map((t) => t.name)).toEqual(["first", "second"]);
    expect(tasks[0]?.id).toBe("dup");
    expect(tasks[1]?.id).not.toBe("dup");
  });

  it("warns when the file changed outside the program", async () => {
    const { data, config, open, warnings } = await setup();
    await data.add({ name: "mine", date: "2024-05-01" });
    await appendFile(
      config.get("storageFile"),
      "x-2,2024-05-01,1h,Edited outside,,pending,low,,,\n",
      "utf8",
    );

    const reloaded = await open();
    expect(reloaded.size).toBe(2);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ kind: "external-change", source: config.get("storageFile") });
  });

  it("keeps the in-memory collection when a write fails", async () => {
    const { data, config } = await setup();
    await config.set("backupEnabled", false);
    await data.add({ name: "kept", date: "2024-05-01" });

    const file = config.get("storageFile");
    await rm(file);
    await mkdir(file);

    await expect(data.add({ name: "lost", date: "2024-05-01" })).rejects.toBeInstanceOf(StorageIOError);
    expect(data.list().map((t) => t.name)).toEqual(["kept"]);
  });

  it("skips invalid rows on load and reports them", async () => {
    const { config, open, warnings } = await setup();
    const file = config.get("storageFile");
    await writeFile(file, "id,date,name\nr-1,2024-05-01,good\nr-2,2024-02-30,bad\n", "utf8");

    const data = await open();
    expect(data.list().map((t) => t.id)).toEqual(["r-1"]);
    expect(warnings).toEqual([
      {
        kind: "row",
        source: file,
        row: 2,
        message: 'Row 2: Invalid date: "2024-02-30" is not a valid gregorian date (expected YYYY-MM-DD)',
      },
    ]);
    expect(data.lastWarnings).toEqual(warnings);
  });

  it("raises StorageIOError when the storage file cannot be read", async () => {
    const { config, open } = await setup();
    await mkdir(config.get("storageFile"));
    await expect(open()).rejects.toBeInstanceOf(StorageIOError);
  });

  it("commits a save whose checksum cannot be written", async () => {
    const { dir, data, open, warnings } = await setup();
    await mkdir(join(dir, ".tasks.csv.meta.json"));

    await data.add({ name: "saved", date: "2024-05-01" });
    expect(data.list().map((t) => t.name)).toEqual(["saved"]);
    expect(warnings.map((w) => w.kind)).toEqual(["checksum"]);

    const reloaded = await open();
    expect(reloaded.list().map((t) => t.name)).toEqual(["saved"]);
    expect(warnings.map((w) => w.kind)).toEqual(["checksum", "checksum"]);
  });

  it("reports a corrupt checksum file", async () => {
    const { dir, data, config, open, warnings } = await setup();
    await data.add({ name: "mine", date: "2024-05-01" });
    const meta = join(dir, ".tasks.csv.meta.json");
    const file = config.get("storageFile");

    await writeFile(meta, JSON.stringify({ size: "big" }), "utf8");
    expect((await open()).size).toBe(1);
    expect(warnings).toEqual([
      { kind: "external-change", source: file, message: `Checksum file ${meta} is corrupt; ${file} could not be verified` },
    ]);

    await writeFile(meta, "{ not json", "utf8");
    await open();
    expect(warnings[1]).toMatchObject({ kind: "external-change", source: file });
    expect(warnings[1]?.message.startsWith(`Checksum file ${meta} is corrupt (`)).toBe(true);
  });

  it("refuses queries before the file is loaded", async () => {
    const dir = await makeTempDir();
    const data = new DataManager(new ConfigStore({ homeDir: dir }));
    expect(() => data.list()).toThrow("DataManager.loadAll() must complete before querying tasks");
  });
});

describe("DataManager editing", () => {
  it("shifts later rows down after a delete", async () => {
    const { data } = await setup();
    for (const name of ["A", "B", "C"]) await data.add({ name, date: "2024-05-01" });

    const removed = await data.delete(1);
    expect(removed.name).toBe("B");
    expect(data.list().map((t) => t.name)).toEqual(["A", "C"]);
  });

  it("persists a delete in the original order", async () => {
    const { data, open } = await setup();
    for (const name of ["A", "B", "C", "D"]) await data.add({ name, date: "2024-05-01" });

    await data.delete(1);
    expect((await open()).list().map((t) => t.name)).toEqual(["A", "C", "D"]);
  });

  it("rejects indices outside the collection", async () => {
    const { data } = await setup();
    await data.add({ name: "only", date: "2024-05-01" });

    await expect(data.edit(5, { name: "x" })).rejects.toBeInstanceOf(IndexOutOfRangeError);
    await expect(data.delete(-1)).rejects.toBeInstanceOf(IndexOutOfRangeError);
    expect(() => data.get(1)).toThrow("No task at index 1: valid range is 0..0");
  });

  it("edits a row in place", async () => {
    const { data } = await setup();
    await data.add({ name: "draft", date: "2024-05-01" });
    await data.add({ name: "other", date: "2024-05-01" });

    const updated = await data.edit(0, { status: "pending", duration: "45m" });
    expect(updated).toMatchObject({ name: "draft", status: "pending", duration: "45min" });
    expect(data.indexOf(updated.id)).toBe(0);
  });
});

describe("DataManager calendar switch", () => {
  it("converts stored dates both ways", async () => {
    const { data, config, open, warnings } = await setup();
    await data.add({ name: "end of july", date: "2024-07-31" });
    const jalaliDate = convertDate("2024-07-31", "gregorian", "jalali");

    expect(await data.changeCalendar("jalali")).toBe(1);
    expect(config.get("calendar")).toBe("jalali");
    expect(data.get(0).date).toBe(jalaliDate);

    const reloaded = await open();
    expect(reloaded.list().map((t) => t.date)).toEqual([jalaliDate]);
    expect(warnings).toEqual([]);

    await reloaded.changeCalendar("gregorian");
    expect((await open()).get(0).date).toBe("2024-07-31");
    expect(config.get("calendar")).toBe("gregorian");
  });

  it("does nothing when the calendar is unchanged", async () => {
    const { data } = await setup();
    await data.add({ name: "x", date: "2024-05-01" });
    expect(await data.changeCalendar("gregorian")).toBe(0);
    expect(data.get(0).date).toBe("2024-05-01");
  });
});

describe("DataManager queries", () => {
  async function seeded() {
    const ctx = await setup();
    await ctx.data.add({ name: "Deploy", date: "2024-05-01", status: "pending", tags: "work", duration: "1h" });
    await ctx.data.add({ name: "Read", date: "2024-05-01", description: "WORK notes", duration: "30min" });
    await ctx.data.add({ name: "Walk", date: "2024-04-30", duration: "a while" });
    return ctx;
  }

  it("combines filter criteria without changing the collection", async () => {
    const { data } = await seeded();

    expect(data.filter({ search: "work" }).map((t) => t.name)).toEqual(["Deploy", "Read"]);
    expect(data.filter({ tag: "WORK" }).map((t) => t.name)).toEqual(["Deploy"]);
    expect(data.filter({ search: "work", status: "completed" }).map((t) => t.name)).toEqual(["Read"]);
    expect(data.filter({ date: "2024/4/30" }).map((t) => t.name)).toEqual(["Walk"]);
    expect(data.size).toBe(3);
  });

  it("lists tasks dated today", async () => {
    const { data } = await seeded();
    expect(data.today()).toBe("2024-05-01");
    expect(data.getToday().map((t) => t.name)).toEqual(["Deploy", "Read"]);
  });

  it("summarizes counts and tracked time", async () => {
    const { data } = await seeded();
    expect(data.statistics()).toEqual({
      total: 3,
      byStatus: { pending: 1, "in-progress": 0, completed: 2 },
      byPriority: { low: 0, medium: 3, high: 0 },
      totalMinutes: 90,
      parsedDurations: 2,
      unparsedDurations: 1,
      today: 2,
    });
  });

  it("describes the storage file", async () => {
    const { data, config } = await setup();
    await data.add({ name: "x", date: "2024-05-01" });
    expect(await data.info()).toMatchObject({
      storageFile: config.get("storageFile"),
      exists: true,
      taskCount: 1,
      backupCount: 0,
    });
  });
});

describe("DataManager import and export", () => {
  it("imports valid rows and reports the bad one", async () => {
    const { dir, data, open, warnings } = await setup();
    const source = join(dir, "incoming.csv");
    await writeFile(
      source,
      [
        "date,duration,name",
        "2024-05-01,1h,one",
        "2024-05-02,2h,two",
        "2024-13-01,1h,three",
        "2024-05-04,30min,four",
        "2024-05-05,1h,five",
        "",
      ].join("\n"),
      "utf8",
    );

    const result = await data.importData(source);
    expect(result.imported).toBe(4);
    expect(result.skipped).toBe(1);
    expect(result.warnings).toEqual([
      {
        kind: "row",
        source: resolve(source),
        row: 3,
        message: 'Row 3: Invalid date: "2024-13-01" is not a valid gregorian date (expected YYYY-MM-DD)',
      },
    ]);
    expect(warnings).toEqual(result.warnings);
    expect(data.lastWarnings).toEqual(result.warnings);
    expect((await open()).list().map((t) => t.name)).toEqual(["one", "two", "four", "five"]);
  });

  it("round-trips through a JSON export", async () => {
    const first = await setup();
    await first.data.add({ name: "alpha", date: "2024-05-01", tags: "a,b" });
    await first.data.add({ name: "beta", date: "2024-05-02" });

    const out = join(first.dir, "export.json");
    expect(await first.data.exportData(out)).toBe(2);
    const exported: unknown = JSON.parse(await readFile(out, "utf8"));
    expect(exported).toEqual(first.data.list().map((t) => ({ ...t, tags: [...t.tags] })));

    const second = await setup();
    const result = await second.data.importData(out);
    expect(result).toEqual({ imported: 2, skipped: 0, warnings: [] });
    expect(second.data.list()).toEqual(first.data.list());
  });

  it("re-issues ids that already exist on import", async () => {
    const { dir, data } = await setup();
    const task = await data.add({ name: "original", date: "2024-05-01" });
    const out = join(dir, "copy.csv");
    await data.exportData(out);

    await data.importData(out);
    const [a, b] = data.list();
    expect(a?.id).toBe(task.id);
    expect(b?.name).toBe("original");
    expect(b?.id).not.toBe(task.id);
  });

  it("refuses to export over the storage file", async () => {
    const { data, config } = await setup();
    await expect(data.exportData(config.get("storageFile"))).rejects.toBeInstanceOf(StorageIOError);
  });

  it("fails on a missing import file", async () => {
    const { dir, data } = await setup();
    await expect(data.importData(join(dir, "nope.csv"))).rejects.toThrow(/^File not found/);
  });
});

describe("DataManager backups", () => {
  it("keeps only the newest backups", async () => {
    const { data, config } = await setup();
    await config.set("backupCount", 2);
    for (const name of ["A", "B", "C", "D"]) await data.add({ name, date: "2024-05-01" });

    const backups = await data.listBackups();
    expect(backups.map((b) => b.sequence)).toEqual([2, 3]);
    expect(backups[0]?.path).toBe(join(data.backupDir, "tasks-backup-000002-20240501-090000.csv"));
  });

  it("backs up once before clearing, whatever the backup setting", async () => {
    const { data, config } = await setup();
    await config.set("backupEnabled", false);
    for (let i = 1; i <= 10; i++) await data.add({ name: `task ${i}`, date: "2024-05-01" });
    expect(await data.listBackups()).toEqual([]);

    expect(await data.clearAll()).toBe(10);
    expect(data.list()).toEqual([]);

    const backups = await data.listBackups();
    expect(backups).toHaveLength(1);
    const saved = decodeRows(await readFile(backups[0]?.path ?? "", "utf8"), "backup");
    expect(saved.rows).toHaveLength(10);
  });

  it("restores a backup after saving the current file", async () => {
    const { data } = await setup();
    await data.add({ name: "kept", date: "2024-05-01" });
    const snapshot = await data.backup();
    await data.add({ name: "dropped", date: "2024-05-01" });

    const result = await data.restore(snapshot);
    expect(result.imported).toBe(1);
    expect(data.list().map((t) => t.name)).toEqual(["kept"]);
    expect((await data.listBackups()).map((b) => b.sequence)).toEqual([1, 2, 3]);
  });

  it("has nothing to back up before the first save", async () => {
    const { data } = await setup();
    await expect(data.backup()).rejects.toBeInstanceOf(StorageIOError);
  });
});
