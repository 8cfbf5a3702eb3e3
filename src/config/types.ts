import type { CalendarMode } from "../utils/date.ts";

export const THEME_NAMES = [
  "default",
  "tokyo-night",
  "catppuccin",
  "gruvbox",
  "nord",
  "dracula",
  "solarized-dark",
] as const;

export type ThemeName = (typeof THEME_NAMES)[number];

export interface DaybookConfig {
  version: 1;
  /** Absolute path of the task CSV file */
  storageFile: string;
  calendar: CalendarMode;
  /** Duration applied to new tasks that leave it blank */
  defaultDuration: string;
  backupEnabled: boolean;
  /** How many rotating backups to keep beside the storage file */
  backupCount: number;
  theme: ThemeName;
}

export type ConfigKey = Exclude<keyof DaybookConfig, "version">;

export type ConfigLoadResult =
  | { status: "loaded"; config: Readonly<DaybookConfig> }
  | { status: "first-run" };

/**
 * Question-and-answer channel for the first-run wizard. The CLI backs it with
 * the terminal; tests script the answers.
 */
export interface SetupPrompter {
  ask(question: string, defaultValue: string): Promise<string>;
  choose<T extends string>(question: string, choices: readonly T[], defaultValue: T): Promise<T>;
  confirm(question: string, defaultValue: boolean): Promise<boolean>;
  info(message: string): void;
}

export type { CalendarMode };
