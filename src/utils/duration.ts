import { toLatinDigits } from "./date.ts";

export interface ParsedDuration {
  /** Total length in whole minutes */
  minutes: number;
  /** Canonical display form, e.g. "1h 30min" */
  display: string;
}

const HOUR_UNITS = new Set(["h", "hr", "hrs", "hour", "hours", "ساعت"]);
const MINUTE_UNITS = new Set(["m", "min", "mins", "minute", "minutes", "دقیقه"]);

const TOKEN = /(\d+(?:\.\d+)?)\s*([^\d\s.,]+)?/gu;

export function formatMinutes(total: number): string {
  if (total < 60) return `${total}min`;
  const h = Math.floor(total / 60);
  const min = total % 60;
  return min > 0 ? `${h}h ${min}min` : `${h}h`;
}

/**
 * Accepts "2h", "30min", "1h 30min", "1h30m", "1.5h", "90m", "1:30",
 * "2 hours", "۲ ساعت". A bare number counts as hours. Returns null when the
 * expression has anything else in it.
 */
export function parseDuration(expr: string): ParsedDuration | null {
  const text = toLatinDigits(expr).trim().toLowerCase().replace(/٫/g, ".");
  if (text === "") return null;

  const clock = /^(\d+):([0-5]\d)$/.exec(text);
  if (clock) {
    const minutes = Number(clock[1]) * 60 + Number(clock[2]);
    return { minutes, display: formatMinutes(minutes) };
  }

  let minutes = 0;
  let consumed = "";
  let matched = 0;
  for (const m of text.matchAll(TOKEN)) {
    const value = Number(m[1]);
    const unit = m[2];
    if (unit === undefined) {
      // Bare number: only allowed as the whole expression
      if (text.trim() !== m[0].trim()) return null;
      minutes += value * 60;
    } else if (HOUR_UNITS.has(unit)) {
      minutes += value * 60;
    } else if (MINUTE_UNITS.has(unit)) {
      minutes += value;
    } else {
      return null;
    }
    consumed += m[0];
    matched++;
  }

  if (matched === 0) return null;
  // Only whitespace may sit between tokens
  const leftover = text.replace(/\s+/g, "");
  if (leftover !== consumed.replace(/\s+/g, "")) return null;

  const rounded = Math.round(minutes);
  if (rounded <= 0) return null;
  return { minutes: rounded, display: formatMinutes(rounded) };
}

/** Canonical form when parseable, otherwise the trimmed original. */
export function normalizeDuration(expr: string): string {
  return parseDuration(expr)?.display ?? expr.trim();
}
