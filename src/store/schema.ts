import { randomUUID } from "node:crypto";
import { z } from "zod";
import { TaskValidationError } from "../errors.ts";
import { normalizeDate } from "../utils/date.ts";
import { normalizeDuration } from "../utils/duration.ts";
import {
  TASK_PRIORITIES,
  TASK_STATUSES,
  type Task,
  type TaskChanges,
  type TaskContext,
  type TaskInput,
  type TaskPriority,
  type TaskStatus,
} from "./types.ts";

const MAX_NAME_LENGTH = 200;

// Spellings found in older files and in other trackers' exports
const STATUS_ALIASES: Record<string, TaskStatus> = {
  in_progress: "in-progress",
  inprogress: "in-progress",
  done: "completed",
  todo: "pending",
};

const PRIORITY_ALIASES: Record<string, TaskPriority> = {
  normal: "medium",
  med: "medium",
  critical: "high",
  urgent: "high",
};

const DEFAULT_STATUS: TaskStatus = "completed";
const DEFAULT_PRIORITY: TaskPriority = "medium";

function splitTags(raw: readonly string[] | string | undefined): string[] {
  const parts = typeof raw === "string" ? [raw] : raw ?? [];
  const seen = new Set<string>();
  for (const part of parts) {
    for (const tag of part.split(",")) {
      const trimmed = tag.trim();
      if (trimmed) seen.add(trimmed);
    }
  }
  return [...seen];
}

function keyword<T extends string>(
  values: readonly [T, ...T[]],
  aliases: Record<string, T>,
  fallback: T,
) {
  return z
    .string()
    .optional()
    .transform((v) => {
      const key = (v ?? "").trim().toLowerCase();
      if (key === "") return fallback;
      return aliases[key] ?? key;
    })
    .pipe(z.enum(values, { errorMap: () => ({ message: `must be one of ${values.join(", ")}` }) }));
}

const timestamp = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z
    .string()
    .refine((v) => !Number.isNaN(Date.parse(v)), { message: "must be an ISO-8601 timestamp" })
    .transform((v) => new Date(v).toISOString())
    .optional(),
);

function taskSchema(ctx: TaskContext) {
  return z.object({
    id: z.preprocess(
      (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
      z.string().trim().optional(),
    ),
    date: z.string().transform((v, c) => {
      const normalized = normalizeDate(v, ctx.calendar);
      if (normalized === null) {
        c.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${v}" is not a valid ${ctx.calendar} date (expected YYYY-MM-DD)`,
        });
        return z.NEVER;
      }
      return normalized;
    }),
    duration: z
      .string()
      .optional()
      .transform((v) => normalizeDuration(v !== undefined && v.trim() !== "" ? v : ctx.defaultDuration))
      .pipe(z.string().min(1, "must not be empty")),
    name: z
      .string()
      .trim()
      .min(1, "must not be empty")
      .max(MAX_NAME_LENGTH, `must be at most ${MAX_NAME_LENGTH} characters`),
    description: z.string().optional().transform((v) => (v ?? "").trim()),
    status: keyword(TASK_STATUSES, STATUS_ALIASES, DEFAULT_STATUS),
    priority: keyword(TASK_PRIORITIES, PRIORITY_ALIASES, DEFAULT_PRIORITY),
    tags: z.union([z.string(), z.array(z.string())]).optional().transform(splitTags),
    createdAt: timestamp,
    updatedAt: timestamp,
  });
}

function toValidationError(error: z.ZodError): TaskValidationError {
  const issue = error.issues[0];
  if (!issue) return new TaskValidationError("task", "failed validation");
  const field = issue.path.length > 0 ? issue.path.join(".") : "task";
  if (issue.code === z.ZodIssueCode.invalid_type) {
    const reason = issue.received === "undefined" ? "is required" : `expected ${issue.expected}, got ${issue.received}`;
    return new TaskValidationError(field, reason);
  }
  return new TaskValidationError(field, issue.message);
}

function freeze(task: Task): Task {
  return Object.freeze({ ...task, tags: Object.freeze([...task.tags]) });
}

// ── Public API ───────────────────────────────────────

/**
 * Validates an untyped record (a CSV row, a JSON import entry) into a frozen
 * Task. Throws TaskValidationError naming the first field that fails.
 */
export function parseTaskRecord(raw: unknown, ctx: TaskContext): Task {
  const parsed = taskSchema(ctx).safeParse(raw);
  if (!parsed.success) throw toValidationError(parsed.error);

  const v = parsed.data;
  const now = (ctx.now?.() ?? new Date()).toISOString();
  const createdAt = v.createdAt ?? now;

  return freeze({
    id: v.id ?? (ctx.newId ?? randomUUID)(),
    date: v.date,
    duration: v.duration,
    name: v.name,
    description: v.description,
    status: v.status,
    priority: v.priority,
    tags: v.tags,
    createdAt,
    updatedAt: v.updatedAt ?? createdAt,
  });
}

export function createTask(input: TaskInput, ctx: TaskContext): Task {
  return parseTaskRecord(input, ctx);
}

/** Field values that reproduce `task` when passed back through createTask. */
export function taskInputFrom(task: Task): TaskInput {
  return {
    id: task.id,
    date: task.date,
    duration: task.duration,
    name: task.name,
    description: task.description,
    status: task.status,
    priority: task.priority,
    tags: [...task.tags],
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  };
}

/**
 * Merges `changes` into `task` and validates the merged record as a whole.
 * Identity and creation time are kept; `updatedAt` moves to now.
 */
export function updateTask(task: Task, changes: TaskChanges, ctx: TaskContext): Task {
  const base = taskInputFrom(task);
  return createTask(
    {
      ...base,
      date: changes.date ?? base.date,
      duration: changes.duration ?? base.duration,
      name: changes.name ?? base.name,
      description: changes.description ?? base.description,
      status: changes.status ?? base.status,
      priority: changes.priority ?? base.priority,
      tags: changes.tags ?? base.tags,
      updatedAt: (ctx.now?.() ?? new Date()).toISOString(),
    },
    ctx,
  );
}
