import { format, isValid, parse } from "date-fns";
import { isValidJalaaliDate, toGregorian, toJalaali } from "jalaali-js";

export type CalendarMode = "gregorian" | "jalali";

export const CALENDAR_MODES: [CalendarMode, ...CalendarMode[]] = ["gregorian", "jalali"];

const JALALI_MONTHS = [
  "Farvardin", "Ordibehesht", "Khordad", "Tir", "Mordad", "Shahrivar",
  "Mehr", "Aban", "Azar", "Dey", "Bahman", "Esfand",
];

const DATE_PATTERN = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/;

// Persian (U+06F0) and Arabic-Indic (U+0660) digit blocks
export function toLatinDigits(input: string): string {
  return input.replace(/[۰-۹٠-٩]/g, (ch) => {
    const code = ch.charCodeAt(0);
    return String(code >= 0x06f0 ? code - 0x06f0 : code - 0x0660);
  });
}

interface DateParts {
  year: number;
  month: number;
  day: number;
}

function splitDate(input: string): DateParts | null {
  const match = DATE_PATTERN.exec(toLatinDigits(input.trim()));
  if (!match) return null;
  const [, y, m, d] = match;
  if (y === undefined || m === undefined || d === undefined) return null;
  return { year: Number(y), month: Number(m), day: Number(d) };
}

function joinDate({ year, month, day }: DateParts): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function isValidGregorian(parts: DateParts): boolean {
  return isValid(parse(`${parts.year}-${parts.month}-${parts.day}`, "yyyy-M-d", new Date()));
}

/**
 * Canonical `YYYY-MM-DD` form of a date in the given calendar, or null when the
 * input does not name a real day. Accepts `/` or `.` separators, unpadded
 * month/day and Persian digits.
 */
export function normalizeDate(input: string, calendar: CalendarMode): string | null {
  const parts = splitDate(input);
  if (!parts) return null;
  const ok = calendar === "jalali"
    ? isValidJalaaliDate(parts.year, parts.month, parts.day)
    : isValidGregorian(parts);
  return ok ? joinDate(parts) : null;
}

export function todayIn(calendar: CalendarMode, now: Date = new Date()): string {
  if (calendar === "gregorian") return format(now, "yyyy-MM-dd");
  const { jy, jm, jd } = toJalaali(now.getFullYear(), now.getMonth() + 1, now.getDate());
  return joinDate({ year: jy, month: jm, day: jd });
}

/** Converts a canonical date between calendars; null if `date` is not valid in `from`. */
export function convertDate(date: string, from: CalendarMode, to: CalendarMode): string | null {
  const normalized = normalizeDate(date, from);
  if (!normalized) return null;
  if (from === to) return normalized;
  const parts = splitDate(normalized);
  if (!parts) return null;
  if (from === "jalali") {
    const { gy, gm, gd } = toGregorian(parts.year, parts.month, parts.day);
    return joinDate({ year: gy, month: gm, day: gd });
  }
  const { jy, jm, jd } = toJalaali(parts.year, parts.month, parts.day);
  return joinDate({ year: jy, month: jm, day: jd });
}

/** e.g. "Jan 5, 2024" or "1403/01/15" */
export function formatDisplayDate(date: string, calendar: CalendarMode): string {
  const parts = splitDate(date);
  if (!parts) return date;
  if (calendar === "jalali") return joinDate(parts).replaceAll("-", "/");
  const parsed = parse(joinDate(parts), "yyyy-MM-dd", new Date());
  return isValid(parsed) ? format(parsed, "MMM d, yyyy") : date;
}

/** e.g. "15 Farvardin 1403" */
export function formatLongJalali(date: string): string {
  const parts = splitDate(date);
  if (!parts) return date;
  const month = JALALI_MONTHS[parts.month - 1];
  return month ? `${parts.day} ${month} ${parts.year}` : date;
}

export function formatRelativeTime(iso: string, now: Date = new Date()): string {
  const diff = now.getTime() - new Date(iso).getTime();
  if (Number.isNaN(diff) || diff < 0) return "just now";
  const seconds = Math.floor(diff / 1000);
  if (seconds < 60) return "just now";
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;
  const days = Math.floor(hours / 24);
  if (days < 30) return `${days}d ago`;
  const months = Math.floor(days / 30);
  return `${months}mo ago`;
}

/** Compact `yyyyMMdd-HHmmss` stamp used in backup file names */
export function fileStamp(now: Date): string {
  return format(now, "yyyyMMdd-HHmmss");
}
