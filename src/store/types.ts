import type { RowParseWarning } from "../errors.ts";
import type { CalendarMode } from "../utils/date.ts";

// ── Task interface ───────────────────────────────────

export const TASK_STATUSES = ["pending", "in-progress", "completed"] as const;
export const TASK_PRIORITIES = ["low", "medium", "high"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export interface Task {
  readonly id: string;
  readonly date: string;
  readonly duration: string;
  readonly name: string;
  readonly description: string;
  readonly status: TaskStatus;
  readonly priority: TaskPriority;
  readonly tags: readonly string[];
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Raw field values as a caller (CLI, CSV row, JSON import) supplies them. */
export interface TaskInput {
  id?: string;
  date: string;
  duration?: string;
  name: string;
  description?: string;
  status?: string;
  priority?: string;
  tags?: readonly string[] | string;
  createdAt?: string;
  updatedAt?: string;
}

export type TaskChanges = Partial<Omit<TaskInput, "id" | "createdAt" | "updatedAt">>;

export interface TaskContext {
  calendar: CalendarMode;
  defaultDuration: string;
  now?: () => Date;
  newId?: () => string;
}

// ── Filter criteria ──────────────────────────────────

/** All present criteria must match. */
export interface TaskFilter {
  date?: string;
  search?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  tag?: string;
}

// ── Query results ────────────────────────────────────

export interface TaskStatistics {
  total: number;
  byStatus: Record<TaskStatus, number>;
  byPriority: Record<TaskPriority, number>;
  totalMinutes: number;
  parsedDurations: number;
  unparsedDurations: number;
  today: number;
}

export interface ImportResult {
  imported: number;
  skipped: number;
  warnings: RowParseWarning[];
}

export interface DataInfo {
  storageFile: string;
  exists: boolean;
  size: number;
  lastModified: string | null;
  taskCount: number;
  backupCount: number;
}

export interface BackupEntry {
  path: string;
  sequence: number;
  createdAt: string;
}

export type ExchangeFormat = "csv" | "json";
