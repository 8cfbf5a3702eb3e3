import type { DataInfo, Task, TaskPriority, TaskStatistics, TaskStatus } from "../store/types.ts";
import { activeColors, paint, sgr } from "../theme/colors.ts";
import {
  convertDate,
  formatDisplayDate,
  formatLongJalali,
  formatRelativeTime,
  type CalendarMode,
} from "../utils/date.ts";
import { formatMinutes } from "../utils/duration.ts";

// ── ANSI color helpers ───────────────────────────────

export const bold = (s: string) => sgr("1", s);
export const dim = (s: string) => paint(activeColors().fgDim, s);
export const accent = (s: string) => paint(activeColors().accent, s);
export const red = (s: string) => paint(activeColors().red, s);
export const green = (s: string) => paint(activeColors().green, s);
export const yellow = (s: string) => paint(activeColors().yellow, s);
export const cyan = (s: string) => paint(activeColors().cyan, s);

// ── Status / priority display ────────────────────────

const STATUS_ICON: Record<TaskStatus, string> = {
  pending: "○ pend",
  "in-progress": "◉ prog",
  completed: "✓ done",
};

function colorStatus(status: TaskStatus): string {
  return paint(activeColors().status[status], STATUS_ICON[status]);
}

const PRIORITY_LABEL: Record<TaskPriority, string> = {
  low: "low",
  medium: "med",
  high: "high",
};

function colorPriority(p: TaskPriority): string {
  const label = PRIORITY_LABEL[p];
  return p === "high" ? bold(paint(activeColors().priority[p], label)) : paint(activeColors().priority[p], label);
}

// ── Table formatting ─────────────────────────────────

function visibleLength(s: string): number {
  return s.replace(/\x1b\[[0-9;]*m/g, "").length;
}

function pad(s: string, len: number): string {
  const diff = len - visibleLength(s);
  return diff > 0 ? s + " ".repeat(diff) : s;
}

function truncate(s: string, max: number): string {
  return s.length > max ? s.slice(0, max - 1) + "…" : s;
}

export interface TaskRow {
  /** Position in the full collection (0-based) */
  index: number;
  task: Task;
}

export function formatTaskTable(rows: readonly TaskRow[], calendar: CalendarMode): string {
  if (rows.length === 0) return dim("  No tasks found.");

  const cols = process.stdout.columns || 100;
  const numWidth = Math.max(1, String(Math.max(...rows.map((r) => r.index + 1))).length);
  // #, ID(8), Date(10), Dur(9), Status(6), Pri(4) and the gaps between them
  const nameMax = Math.max(12, cols - (numWidth + 60));

  const header = dim(
    `  ${pad("#", numWidth)}   ${pad("ID", 8)}   ${pad("Date", 10)}   ${pad("Duration", 9)}   ${pad("Status", 6)}   ${pad("Pri", 4)}   ${pad("Name", nameMax)}   Tags`,
  );

  const lines = rows.map(({ index, task: t }) => {
    const num = accent(String(index + 1));
    const id = dim(t.id.slice(0, 8));
    const date = calendar === "jalali" ? t.date.replaceAll("-", "/") : t.date;
    const name = truncate(t.name, nameMax);
    const tags = t.tags.length ? cyan(t.tags.map((tag) => `#${tag}`).join(" ")) : dim("—");

    return `  ${pad(num, numWidth)}   ${pad(id, 8)}   ${pad(date, 10)}   ${pad(t.duration, 9)}   ${pad(colorStatus(t.status), 6)}   ${pad(colorPriority(t.priority), 4)}   ${pad(name, nameMax)}   ${tags}`;
  });

  return [header, ...lines].join("\n");
}

// ── Detail formatting ────────────────────────────────

export function formatTaskDetail(row: TaskRow, calendar: CalendarMode): string {
  const { task } = row;
  const other: CalendarMode = calendar === "jalali" ? "gregorian" : "jalali";
  const converted = convertDate(task.date, calendar, other);
  const dateLine = calendar === "jalali"
    ? `${formatDisplayDate(task.date, calendar)} (${formatLongJalali(task.date)})`
    : formatDisplayDate(task.date, calendar);

  const lines: string[] = [];
  lines.push(`  ${bold("Task:")}     ${task.name}`);
  lines.push(`  ${bold("Row:")}      ${row.index + 1}`);
  lines.push(`  ${bold("ID:")}       ${task.id}`);
  lines.push(`  ${bold("Date:")}     ${dateLine}${converted ? dim(`  ${other}: ${converted}`) : ""}`);
  lines.push(`  ${bold("Duration:")} ${task.duration}`);
  lines.push(`  ${bold("Status:")}   ${colorStatus(task.status)}`);
  lines.push(`  ${bold("Priority:")} ${colorPriority(task.priority)}`);
  lines.push(`  ${bold("Tags:")}     ${task.tags.length ? task.tags.map((t) => cyan("#" + t)).join(" ") : dim("—")}`);
  lines.push(`  ${bold("Created:")}  ${task.createdAt} (${formatRelativeTime(task.createdAt)})`);
  lines.push(`  ${bold("Updated:")}  ${task.updatedAt} (${formatRelativeTime(task.updatedAt)})`);

  if (task.description) {
    lines.push("");
    lines.push(`  ${bold("Description:")}`);
    for (const line of task.description.split("\n")) lines.push(`  ${line}`);
  }

  return lines.join("\n");
}

// ── Statistics / info ────────────────────────────────

export function formatStatistics(stats: TaskStatistics): string {
  const lines: string[] = [];
  lines.push(`  ${bold("Total tasks:")}     ${stats.total}`);
  lines.push(`  ${bold("Today:")}           ${stats.today}`);
  lines.push("");
  lines.push(`  ${bold("By status")}`);
  for (const [status, count] of Object.entries(stats.byStatus)) {
    lines.push(`    ${pad(status, 12)} ${count}`);
  }
  lines.push(`  ${bold("By priority")}`);
  for (const [priority, count] of Object.entries(stats.byPriority)) {
    lines.push(`    ${pad(priority, 12)} ${count}`);
  }
  lines.push("");
  lines.push(`  ${bold("Time tracked:")}    ${stats.totalMinutes > 0 ? formatMinutes(stats.totalMinutes) : "0min"}`);
  if (stats.unparsedDurations > 0) {
    lines.push(`  ${dim(`${stats.unparsedDurations} task(s) with a duration that could not be read are not counted`)}`);
  }
  return lines.join("\n");
}

export function formatDataInfo(info: DataInfo): string {
  return [
    `  ${bold("Storage file:")}  ${info.storageFile}`,
    `  ${bold("Exists:")}        ${info.exists ? "yes" : "no"}`,
    `  ${bold("Size:")}          ${info.size} bytes`,
    `  ${bold("Last modified:")} ${info.lastModified ?? dim("—")}`,
    `  ${bold("Tasks:")}         ${info.taskCount}`,
    `  ${bold("Backups:")}       ${info.backupCount}`,
  ].join("\n");
}

// ── Success / error helpers ──────────────────────────

export function success(msg: string): void {
  console.log(green("✓") + " " + msg);
}

export function error(msg: string): void {
  console.error(red("error:") + " " + msg);
}

export function warn(msg: string): void {
  console.error(yellow("warning:") + " " + msg);
}
