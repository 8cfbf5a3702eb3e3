import type { ThemeName } from "../config/types.ts";
import { THEMES, type ThemeColors } from "./themes.ts";

// ── Mutable active theme ─────────────────────────────

let _activeTheme: ThemeName = "default";
let _colorEnabled = true;

export function setTheme(name: ThemeName): void {
  _activeTheme = name;
}

export function setColorEnabled(enabled: boolean): void {
  _colorEnabled = enabled;
}

export function activeColors(): ThemeColors {
  return THEMES[_activeTheme];
}

// ── ANSI rendering ───────────────────────────────────

function hexToRgb(hex: string): [number, number, number] | null {
  const m = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!m) return null;
  return [parseInt(m[1] ?? "0", 16), parseInt(m[2] ?? "0", 16), parseInt(m[3] ?? "0", 16)];
}

export function sgr(code: string, s: string): string {
  return _colorEnabled ? `\x1b[${code}m${s}\x1b[0m` : s;
}

/** Truecolor foreground; plain text when colour is off or the value is not #rrggbb. */
export function paint(hex: string, s: string): string {
  const rgb = hexToRgb(hex);
  return rgb ? sgr(`38;2;${rgb.join(";")}`, s) : s;
}
