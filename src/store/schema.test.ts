import { describe, expect, it } from "vitest";
import { TaskValidationError } from "../errors.ts";
import { createTask, parseTaskRecord, updateTask } from "./schema.ts";
import type { TaskContext } from "./types.ts";

const CREATED = "2024-05-01T08:00:00.000Z";
const LATER = "2024-05-02T09:30:00.000Z";

const ctx: TaskContext = {
  calendar: "gregorian",
  defaultDuration: "1h",
  now: () => new Date(CREATED),
  newId: () => "id-1",
};

function validationError(fn: () => unknown): TaskValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TaskValidationError) return err;
    throw err;
  }
  throw new Error("expected a TaskValidationError");
}

describe("createTask", () => {
  it("fills defaults and normalizes fields", () => {
    const task = createTask({ name: "  Write report ", date: "2024-5-1" }, ctx);
    expect(task).toEqual({
      id: "id-1",
      date: "2024-05-01",
      duration: "1h",
      name: "Write report",
      description: "",
      status: "completed",
      priority: "medium",
      tags: [],
      createdAt: CREATED,
      updatedAt: CREATED,
    });
    expect(Object.isFrozen(task)).toBe(true);
  });

  it("maps legacy status and priority spellings", () => {
    const task = createTask({ name: "x", date: "2024-05-01", status: "In_Progress", priority: "normal" }, ctx);
    expect(task.status).toBe("in-progress");
    expect(task.priority).toBe("medium");
    expect(createTask({ name: "x", date: "2024-05-01", status: "done", priority: "urgent" }, ctx)).toMatchObject({
      status: "completed",
      priority: "high",
    });
  });

  it("splits, trims and dedupes tags", () => {
    expect(createTask({ name: "x", date: "2024-05-01", tags: "a, b,,a" }, ctx).tags).toEqual(["a", "b"]);
    expect(createTask({ name: "x", date: "2024-05-01", tags: ["ops", " ops ", "کار"] }, ctx).tags).toEqual(["ops", "کار"]);
  });

  it("canonicalizes readable durations and keeps free text", () => {
    expect(createTask({ name: "x", date: "2024-05-01", duration: "90m" }, ctx).duration).toBe("1h 30min");
    expect(createTask({ name: "x", date: "2024-05-01", duration: "a while" }, ctx).duration).toBe("a while");
  });

  it("validates dates against the jalali calendar", () => {
    const jalali: TaskContext = { ...ctx, calendar: "jalali" };
    expect(createTask({ name: "x", date: "۱۴۰۳/۰۱/۱۵" }, jalali).date).toBe("1403-01-15");
    expect(validationError(() => createTask({ name: "x", date: "1402-12-30" }, jalali)).field).toBe("date");
  });

  it("names the offending field", () => {
    const badDate = validationError(() => createTask({ name: "x", date: "2024-02-30" }, ctx));
    expect(badDate.field).toBe("date");
    expect(badDate.message).toBe('Invalid date: "2024-02-30" is not a valid gregorian date (expected YYYY-MM-DD)');

    const blank = validationError(() => createTask({ name: "   ", date: "2024-05-01" }, ctx));
    expect(blank.message).toBe("Invalid name: must not be empty");

    const status = validationError(() => createTask({ name: "x", date: "2024-05-01", status: "blocked" }, ctx));
    expect(status.message).toBe("Invalid status: must be one of pending, in-progress, completed");
  });

  it("rejects names over 200 characters", () => {
    const err = validationError(() => createTask({ name: "n".repeat(201), date: "2024-05-01" }, ctx));
    expect(err.message).toBe("Invalid name: must be at most 200 characters");
  });
});

describe("parseTaskRecord", () => {
  it("reports missing required fields", () => {
    expect(validationError(() => parseTaskRecord({ date: "2024-05-01" }, ctx)).message).toBe("Invalid name: is required");
  });

  it("keeps stored ids and timestamps", () => {
    const task = parseTaskRecord(
      { id: "keep-me", date: "2024-05-01", name: "x", createdAt: "2024-04-01T00:00:00Z", updatedAt: "" },
      ctx,
    );
    expect(task.id).toBe("keep-me");
    expect(task.createdAt).toBe("2024-04-01T00:00:00.000Z");
    expect(task.updatedAt).toBe("2024-04-01T00:00:00.000Z");
  });

  it("rejects unreadable timestamps", () => {
    const err = validationError(() => parseTaskRecord({ date: "2024-05-01", name: "x", createdAt: "last week" }, ctx));
    expect(err.message).toBe("Invalid createdAt: must be an ISO-8601 timestamp");
  });
});

describe("updateTask", () => {
  it("keeps identity and creation time", () => {
    const task = createTask({ name: "Plan", date: "2024-05-01", tags: "a,b" }, ctx);
    const later: TaskContext = { ...ctx, now: () => new Date(LATER), newId: () => "other" };
    const updated = updateTask(task, { status: "pending", tags: "" }, later);

    expect(updated).toEqual({ ...task, status: "pending", tags: [], updatedAt: LATER });
    expect(task.status).toBe("completed");
  });

  it("validates the merged record", () => {
    const task = createTask({ name: "Plan", date: "2024-05-01" }, ctx);
    expect(validationError(() => updateTask(task, { date: "not-a-date" }, ctx)).field).toBe("date");
  });
});
