import { createHash } from "node:crypto";
import { copyFile, mkdir, readFile, readdir, rm, stat } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { z } from "zod";
import type { ConfigStore } from "../config/config.ts";
import {
  IndexOutOfRangeError,
  StorageIOError,
  TaskValidationError,
  isNodeError,
  type RowParseWarning,
} from "../errors.ts";
import { writeFileAtomic } from "../utils/atomic-write.ts";
import { convertDate, fileStamp, normalizeDate, todayIn, type CalendarMode } from "../utils/date.ts";
import { parseDuration } from "../utils/duration.ts";
import { decodeRows, encodeTasks, recordFromObject } from "./csv.ts";
import { createTask, parseTaskRecord, taskInputFrom, updateTask } from "./schema.ts";
import type {
  BackupEntry,
  DataInfo,
  ExchangeFormat,
  ImportResult,
  Task,
  TaskChanges,
  TaskContext,
  TaskFilter,
  TaskInput,
  TaskPriority,
  TaskStatistics,
  TaskStatus,
} from "./types.ts";

const BACKUP_DIR_NAME = "backups";

const fileMetaSchema = z.object({
  size: z.number().int().nonnegative(),
  sha256: z.string(),
});

type FileMeta = z.infer<typeof fileMetaSchema>;

function digest(text: string): FileMeta {
  return {
    size: Buffer.byteLength(text, "utf8"),
    sha256: createHash("sha256").update(text, "utf8").digest("hex"),
  };
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function inferFormat(path: string): ExchangeFormat {
  return extname(path).toLowerCase() === ".json" ? "json" : "csv";
}

function matchesSearch(task: Task, query: string): boolean {
  return (
    task.name.toLowerCase().includes(query) ||
    task.description.toLowerCase().includes(query) ||
    task.tags.some((tag) => tag.toLowerCase().includes(query))
  );
}

export interface DataManagerOptions {
  /** Receives every skipped row and external-change notice. Defaults to stderr. */
  onWarning?: (warning: RowParseWarning) => void;
  now?: () => Date;
}

/**
 * Owns the CSV storage file. The whole collection lives in memory; every
 * mutation builds the next collection, rewrites the file with a staged write,
 * and only then replaces the in-memory copy.
 *
 * Tasks are addressed by row index. Indices shift after add/delete, so
 * callers re-read `list()` after every mutating call.
 */
export class DataManager {
  private _tasks: readonly Task[] = [];
  private _loaded = false;
  private _lastWarnings: RowParseWarning[] = [];
  private readonly _onWarning: (warning: RowParseWarning) => void;
  private readonly _now: () => Date;

  constructor(
    readonly config: ConfigStore,
    options: DataManagerOptions = {},
  ) {
    this._onWarning = options.onWarning ?? ((w) => console.error(`[daybook] ${w.message}`));
    this._now = options.now ?? (() => new Date());
  }

  static async open(config: ConfigStore, options?: DataManagerOptions): Promise<DataManager> {
    const manager = new DataManager(config, options);
    await manager.loadAll();
    return manager;
  }

  get storageFile(): string {
    return this.config.get("storageFile");
  }

  get backupDir(): string {
    return join(dirname(this.storageFile), BACKUP_DIR_NAME);
  }

  get loaded(): boolean {
    return this._loaded;
  }

  /** Warnings raised by the most recent load, import or restore */
  get lastWarnings(): readonly RowParseWarning[] {
    return this._lastWarnings;
  }

  get size(): number {
    return this.loadedTasks().length;
  }

  // ── Load / save ───────────────────────────────────────

  async loadAll(): Promise<Task[]> {
    const file = this.storageFile;
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") {
        this._tasks = [];
        this._loaded = true;
        this._lastWarnings = [];
        return [];
      }
      throw new StorageIOError(file, `Could not read ${file}`, err);
    }

    const { tasks, warnings } = this.decode(text, file, new Set());
    const external = await this.checkExternalChange(file, text);
    if (external) warnings.unshift(external);

    this.report(warnings);
    this._tasks = Object.freeze(tasks);
    this._loaded = true;
    return [...tasks];
  }

  async saveAll(tasks: readonly Task[]): Promise<void> {
    await this.write(tasks, this.config.get("backupEnabled"));
  }

  // ── CRUD ──────────────────────────────────────────────

  async add(fields: TaskInput): Promise<Task> {
    const current = await this.ensureLoaded();
    const task = createTask({ ...fields, id: undefined }, this.context());
    await this.saveAll([...current, task]);
    return task;
  }

  async edit(index: number, changes: TaskChanges): Promise<Task> {
    const current = await this.ensureLoaded();
    const existing = this.at(current, index);
    const updated = updateTask(existing, changes, this.context());
    await this.saveAll(current.map((t, i) => (i === index ? updated : t)));
    return updated;
  }

  /** Removes the row at `index`; every later row moves down by one. */
  async delete(index: number): Promise<Task> {
    const current = await this.ensureLoaded();
    const removed = this.at(current, index);
    await this.saveAll(current.filter((_, i) => i !== index));
    return removed;
  }

  /** Empties the collection. Always backs the file up first, whatever the backup setting. */
  async clearAll(): Promise<number> {
    const current = await this.ensureLoaded();
    if (await this.exists(this.storageFile)) {
      await this.createBackup(this.storageFile);
    }
    await this.write([], false);
    return current.length;
  }

  /**
   * Switches the configured calendar and rewrites every stored date in it.
   * Nothing changes when a date has no counterpart in the target calendar.
   */
  async changeCalendar(to: CalendarMode): Promise<number> {
    const current = await this.ensureLoaded();
    const from = this.config.get("calendar");
    if (from === to) return 0;

    const converted = current.map((task) => {
      const date = convertDate(task.date, from, to);
      if (date === null) {
        throw new TaskValidationError("date", `"${task.date}" (${task.name}) has no ${to} equivalent`);
      }
      return Object.freeze({ ...task, date });
    });

    await this.saveAll(converted);
    try {
      await this.config.set("calendar", to);
    } catch (err) {
      await this.write(current, false);
      throw err;
    }
    return converted.length;
  }

  // ── Queries ───────────────────────────────────────────

  list(): Task[] {
    return [...this.loadedTasks()];
  }

  get(index: number): Task {
    return this.at(this.loadedTasks(), index);
  }

  /** Row index of the task with this id, or -1 */
  indexOf(id: string): number {
    return this.loadedTasks().findIndex((t) => t.id === id);
  }

  filter(criteria: TaskFilter): Task[] {
    const calendar = this.config.get("calendar");
    const date = criteria.date !== undefined
      ? normalizeDate(criteria.date, calendar) ?? criteria.date.trim()
      : undefined;
    const query = criteria.search?.trim().toLowerCase() ?? "";
    const tag = criteria.tag?.trim().toLowerCase() ?? "";

    return this.loadedTasks().filter((t) => {
      if (date !== undefined && t.date !== date) return false;
      if (query && !matchesSearch(t, query)) return false;
      if (criteria.status && t.status !== criteria.status) return false;
      if (criteria.priority && t.priority !== criteria.priority) return false;
      if (tag && !t.tags.some((x) => x.toLowerCase() === tag)) return false;
      return true;
    });
  }

  getToday(): Task[] {
    return this.filter({ date: this.today() });
  }

  today(): string {
    return todayIn(this.config.get("calendar"), this._now());
  }

  statistics(): TaskStatistics {
    const tasks = this.loadedTasks();
    const byStatus: Record<TaskStatus, number> = { pending: 0, "in-progress": 0, completed: 0 };
    const byPriority: Record<TaskPriority, number> = { low: 0, medium: 0, high: 0 };
    let totalMinutes = 0;
    let parsedDurations = 0;
    let unparsedDurations = 0;

    for (const t of tasks) {
      byStatus[t.status]++;
      byPriority[t.priority]++;
      const parsed = parseDuration(t.duration);
      if (parsed) {
        totalMinutes += parsed.minutes;
        parsedDurations++;
      } else {
        unparsedDurations++;
      }
    }

    return {
      total: tasks.length,
      byStatus,
      byPriority,
      totalMinutes,
      parsedDurations,
      unparsedDurations,
      today: this.getToday().length,
    };
  }

  async info(): Promise<DataInfo> {
    const file = this.storageFile;
    let size = 0;
    let lastModified: string | null = null;
    let exists = false;
    try {
      const st = await stat(file);
      exists = true;
      size = st.size;
      lastModified = st.mtime.toISOString();
    } catch (err) {
      if (!(isNodeError(err) && err.code === "ENOENT")) {
        throw new StorageIOError(file, `Could not stat ${file}`, err);
      }
    }
    const backups = await this.listBackups();
    return {
      storageFile: file,
      exists,
      size,
      lastModified,
      taskCount: this.loadedTasks().length,
      backupCount: backups.length,
    };
  }

  // ── Import / export ───────────────────────────────────

  async exportData(path: string, format: ExchangeFormat = inferFormat(path)): Promise<number> {
    const target = resolve(path);
    if (target === resolve(this.storageFile)) {
      throw new StorageIOError(target, "Refusing to export over the storage file");
    }
    const tasks = this.loadedTasks();
    const text = format === "json"
      ? `${JSON.stringify(tasks.map((t) => ({ ...t, tags: [...t.tags] })), null, 2)}\n`
      : encodeTasks(tasks);
    await writeFileAtomic(target, text);
    return tasks.length;
  }

  /**
   * Appends every valid row of a CSV or JSON file. Invalid rows are skipped
   * and reported; they never abort the import.
   */
  async importData(path: string, format: ExchangeFormat = inferFormat(path)): Promise<ImportResult> {
    const current = await this.ensureLoaded();
    const source = resolve(path);
    const text = await this.readSource(source);
    const taken = new Set(current.map((t) => t.id));

    const { tasks, warnings } = format === "json"
      ? this.decodeJson(text, source, taken)
      : this.decode(text, source, taken);

    this.report(warnings);
    if (tasks.length > 0) {
      await this.saveAll([...current, ...tasks]);
    }
    return {
      imported: tasks.length,
      skipped: warnings.filter((w) => w.kind === "row").length,
      warnings,
    };
  }

  // ── Backups ───────────────────────────────────────────

  /** Manual snapshot of the storage file */
  async backup(): Promise<string> {
    const file = this.storageFile;
    if (!(await this.exists(file))) {
      throw new StorageIOError(file, `Nothing to back up: ${file} does not exist yet`);
    }
    return this.createBackup(file);
  }

  /** Backups of the current storage file, oldest first */
  async listBackups(): Promise<BackupEntry[]> {
    const dir = this.backupDir;
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return [];
      throw new StorageIOError(dir, `Could not list ${dir}`, err);
    }

    const pattern = this.backupPattern();
    const entries: BackupEntry[] = [];
    for (const name of names) {
      const m = pattern.exec(name);
      if (!m) continue;
      const path = join(dir, name);
      const st = await stat(path);
      entries.push({ path, sequence: Number(m[1]), createdAt: st.mtime.toISOString() });
    }
    return entries.sort((a, b) => a.sequence - b.sequence);
  }

  /** Replaces the collection with a backup's rows. The current file is backed up first. */
  async restore(backupPath: string): Promise<ImportResult> {
    await this.ensureLoaded();
    const source = resolve(backupPath);
    const text = await this.readSource(source);
    const { tasks, warnings } = this.decode(text, source, new Set());
    this.report(warnings);

    if (await this.exists(this.storageFile)) {
      await this.createBackup(this.storageFile);
    }
    await this.write(tasks, false);
    return {
      imported: tasks.length,
      skipped: warnings.filter((w) => w.kind === "row").length,
      warnings,
    };
  }

  // ── Private ───────────────────────────────────────────

  private context(): TaskContext {
    return {
      calendar: this.config.get("calendar"),
      defaultDuration: this.config.get("defaultDuration"),
      now: this._now,
    };
  }

  private loadedTasks(): readonly Task[] {
    if (!this._loaded) {
      throw new Error("DataManager.loadAll() must complete before querying tasks");
    }
    return this._tasks;
  }

  private async ensureLoaded(): Promise<readonly Task[]> {
    if (!this._loaded) await this.loadAll();
    return this._tasks;
  }

  private at(tasks: readonly Task[], index: number): Task {
    const task = Number.isInteger(index) && index >= 0 ? tasks[index] : undefined;
    if (!task) throw new IndexOutOfRangeError(index, tasks.length);
    return task;
  }

  private async write(tasks: readonly Task[], backup: boolean): Promise<void> {
    const file = this.storageFile;
    if (backup && (await this.exists(file))) {
      await this.createBackup(file);
    }
    const text = encodeTasks(tasks);
    await writeFileAtomic(file, text);
    this._tasks = Object.freeze([...tasks]);
    this._loaded = true;

    // Data file is committed; a checksum failure is reported, not thrown
    try {
      await writeFileAtomic(this.metaPath(file), `${JSON.stringify(digest(text))}\n`);
    } catch (err) {
      if (!(err instanceof StorageIOError)) throw err;
      this._onWarning({ kind: "checksum", source: file, message: `Saved ${file}, but ${err.message}` });
    }
  }

  private decode(text: string, source: string, taken: Set<string>): { tasks: Task[]; warnings: RowParseWarning[] } {
    let decoded: ReturnType<typeof decodeRows>;
    try {
      decoded = decodeRows(text, source);
    } catch (err) {
      throw new StorageIOError(source, `Could not parse ${source} as CSV`, err);
    }
    const result = this.validateRows(decoded.rows, source, taken);
    result.warnings.push(...decoded.warnings);
    result.warnings.sort((a, b) => (a.row ?? 0) - (b.row ?? 0));
    return result;
  }

  private decodeJson(text: string, source: string, taken: Set<string>): { tasks: Task[]; warnings: RowParseWarning[] } {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new StorageIOError(source, `Could not parse ${source} as JSON`, err);
    }
    if (!Array.isArray(parsed)) {
      throw new StorageIOError(source, `${source} must contain a JSON array of tasks`);
    }
    const entries = parsed.map((entry: unknown, i) => ({ row: i + 1, record: recordFromObject(entry) }));
    return this.validateRows(entries, source, taken);
  }

  private validateRows(
    entries: { row: number; record: unknown }[],
    source: string,
    taken: Set<string>,
  ): { tasks: Task[]; warnings: RowParseWarning[] } {
    const ctx = this.context();
    const tasks: Task[] = [];
    const warnings: RowParseWarning[] = [];

    for (const { row, record } of entries) {
      try {
        let task = parseTaskRecord(record, ctx);
        if (taken.has(task.id)) {
          task = parseTaskRecord({ ...taskInputFrom(task), id: undefined }, ctx);
        }
        taken.add(task.id);
        tasks.push(task);
      } catch (err) {
        if (!(err instanceof TaskValidationError)) throw err;
        warnings.push({ kind: "row", source, row, message: `Row ${row}: ${err.message}` });
      }
    }
    return { tasks, warnings };
  }

  private report(warnings: RowParseWarning[]): void {
    this._lastWarnings = warnings;
    for (const w of warnings) this._onWarning(w);
  }

  private async readSource(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") {
        throw new StorageIOError(path, `File not found: ${path}`, err);
      }
      throw new StorageIOError(path, `Could not read ${path}`, err);
    }
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return false;
      throw new StorageIOError(path, `Could not stat ${path}`, err);
    }
  }

  // ── Backup files ──────────────────────────────────────

  private backupStem(): { stem: string; ext: string } {
    const file = this.storageFile;
    const ext = extname(file) || ".csv";
    return { stem: basename(file, extname(file)), ext };
  }

  private backupPattern(): RegExp {
    const { stem, ext } = this.backupStem();
    return new RegExp(`^${escapeRegExp(stem)}-backup-(\\d{6,})-\\d{8}-\\d{6}${escapeRegExp(ext)}$`);
  }

  private async createBackup(source: string): Promise<string> {
    const dir = this.backupDir;
    const existing = await this.listBackups();
    const sequence = (existing.at(-1)?.sequence ?? 0) + 1;
    const { stem, ext } = this.backupStem();
    const target = join(dir, `${stem}-backup-${String(sequence).padStart(6, "0")}-${fileStamp(this._now())}${ext}`);

    try {
      await mkdir(dir, { recursive: true });
      await copyFile(source, target);
    } catch (err) {
      throw new StorageIOError(target, `Could not back up ${source}`, err);
    }

    const keep = this.config.get("backupCount");
    const all = [...existing, { path: target, sequence, createdAt: this._now().toISOString() }];
    for (const old of all.slice(0, Math.max(0, all.length - keep))) {
      try {
        await rm(old.path, { force: true });
      } catch (err) {
        throw new StorageIOError(old.path, `Could not remove old backup ${old.path}`, err);
      }
    }
    return target;
  }

  // ── External-change detection ─────────────────────────

  private metaPath(file: string): string {
    return join(dirname(file), `.${basename(file)}.meta.json`);
  }

  private async checkExternalChange(file: string, text: string): Promise<RowParseWarning | null> {
    const metaPath = this.metaPath(file);
    let raw: string;
    try {
      raw = await readFile(metaPath, "utf8");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return null;
      const reason = err instanceof Error ? err.message : String(err);
      return { kind: "checksum", source: file, message: `Could not read the checksum of ${file}: ${reason}` };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { kind: "external-change", source: file, message: `Checksum file ${metaPath} is corrupt (${reason}); ${file} could not be verified` };
    }
    const expected = fileMetaSchema.safeParse(parsed);
    if (!expected.success) {
      return { kind: "external-change", source: file, message: `Checksum file ${metaPath} is corrupt; ${file} could not be verified` };
    }

    const actual = digest(text);
    if (actual.size === expected.data.size && actual.sha256 === expected.data.sha256) return null;
    return {
      kind: "external-change",
      source: file,
      message: `${file} was modified outside daybook since it was last saved (size ${expected.data.size} → ${actual.size} bytes)`,
    };
  }
}
