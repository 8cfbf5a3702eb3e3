import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { extname, join, resolve } from "node:path";
import { z } from "zod";
import { ConfigValidationError, StorageIOError, isNodeError } from "../errors.ts";
import { CALENDAR_MODES } from "../utils/date.ts";
import { writeFileAtomic } from "../utils/atomic-write.ts";
import { parseDuration } from "../utils/duration.ts";
import {
  THEME_NAMES,
  type ConfigKey,
  type ConfigLoadResult,
  type DaybookConfig,
  type SetupPrompter,
} from "./types.ts";

export const DEFAULT_STORAGE_NAME = "tasks.csv";
const SETUP_ATTEMPTS = 3;

export function defaultHomeDir(): string {
  return process.env.DAYBOOK_HOME || join(homedir(), ".daybook");
}

/** Expands `~`, resolves to an absolute path and names a file inside bare directories. */
export function resolveStoragePath(input: string): string {
  const trimmed = input.trim();
  const expanded = trimmed === "~" || trimmed.startsWith("~/")
    ? join(homedir(), trimmed.slice(1))
    : trimmed;
  const absolute = resolve(expanded);
  return extname(absolute) === "" ? join(absolute, DEFAULT_STORAGE_NAME) : absolute;
}

// ── Per-key domains ──────────────────────────────────

const KEY_SCHEMAS: { [K in ConfigKey]: z.ZodType<DaybookConfig[K], z.ZodTypeDef, unknown> } = {
  storageFile: z.string().trim().min(1, "must not be empty").transform(resolveStoragePath),
  calendar: z.enum(CALENDAR_MODES, {
    errorMap: () => ({ message: `must be one of ${CALENDAR_MODES.join(", ")}` }),
  }),
  defaultDuration: z
    .string()
    .trim()
    .min(1, "must not be empty")
    .refine((v) => parseDuration(v) !== null, { message: "must be a duration such as 1h, 30min or 1h 30min" })
    .transform((v) => parseDuration(v)?.display ?? v),
  backupEnabled: z.boolean({ invalid_type_error: "must be true or false" }),
  backupCount: z
    .number({ invalid_type_error: "must be a whole number" })
    .int("must be a whole number")
    .min(1, "must be at least 1")
    .max(100, "must be at most 100"),
  theme: z.enum(THEME_NAMES, {
    errorMap: () => ({ message: `must be one of ${THEME_NAMES.join(", ")}` }),
  }),
};

const CONFIG_KEYS = Object.keys(KEY_SCHEMAS).filter(isConfigKey);

// Settings files written by the earlier tool used snake_case names
const LEGACY_KEYS: Record<string, ConfigKey> = {
  csv_file: "storageFile",
  date_format: "calendar",
  default_duration: "defaultDuration",
  auto_backup: "backupEnabled",
  backup_count: "backupCount",
};

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(KEY_SCHEMAS, key);
}

export function configKeys(): readonly ConfigKey[] {
  return CONFIG_KEYS;
}

/** Turns command-line text into the type a key expects; other values pass through. */
export function coerceConfigValue(key: ConfigKey, value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim().toLowerCase();
  if (key === "backupEnabled") {
    if (["true", "yes", "on", "1"].includes(trimmed)) return true;
    if (["false", "no", "off", "0"].includes(trimmed)) return false;
  }
  if (key === "backupCount" && /^-?\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  return value;
}

function validateValue<K extends ConfigKey>(key: K, value: unknown): DaybookConfig[K] {
  const result = KEY_SCHEMAS[key].safeParse(coerceConfigValue(key, value));
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "is invalid";
    throw new ConfigValidationError(key, `Invalid value for ${key}: ${reason}`);
  }
  return result.data;
}

function assignValue<K extends ConfigKey>(config: DaybookConfig, key: K, raw: unknown): void {
  config[key] = validateValue(key, raw);
}

// ── ConfigStore ──────────────────────────────────────

/**
 * Process-wide settings. Constructed once at startup and handed to whatever
 * needs it; every `set` is validated and persisted before it returns.
 */
export class ConfigStore {
  readonly homeDir: string;
  readonly path: string;

  private _config: DaybookConfig;
  private _loaded = false;

  constructor(options: { homeDir?: string } = {}) {
    this.homeDir = options.homeDir ?? defaultHomeDir();
    this.path = join(this.homeDir, "config.json");
    this._config = ConfigStore.defaults(this.homeDir);
  }

  static defaults(homeDir: string = defaultHomeDir()): DaybookConfig {
    return {
      version: 1,
      storageFile: join(homeDir, DEFAULT_STORAGE_NAME),
      calendar: "gregorian",
      defaultDuration: "1h",
      backupEnabled: true,
      backupCount: 5,
      theme: "default",
    };
  }

  get loaded(): boolean {
    return this._loaded;
  }

  async load(): Promise<ConfigLoadResult> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return { status: "first-run" };
      throw new StorageIOError(this.path, `Could not read ${this.path}`, err);
    }

    let parsed: unknown;
    try {
      parsed = text.trim() ? JSON.parse(text) : {};
    } catch {
      throw new ConfigValidationError("config", `${this.path} is not valid JSON`);
    }
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigValidationError("config", `${this.path} must contain a JSON object`);
    }

    const next = ConfigStore.defaults(this.homeDir);
    for (const [rawKey, value] of Object.entries(parsed)) {
      const key = isConfigKey(rawKey) ? rawKey : LEGACY_KEYS[rawKey];
      if (key === undefined || value === undefined || value === null) continue;
      assignValue(next, key, value);
    }

    this._config = next;
    this._loaded = true;
    return { status: "loaded", config: this.snapshot() };
  }

  /**
   * Interactive first-run wizard. Each answer goes through the same domain
   * check as `set`; after three rejected answers the default is kept.
   */
  async runFirstTimeSetup(prompter: SetupPrompter): Promise<Readonly<DaybookConfig>> {
    const next = ConfigStore.defaults(this.homeDir);
    prompter.info("First-time setup: answer a few questions, or press Enter to keep the default.");

    const askUntilValid = async <K extends ConfigKey>(
      key: K,
      question: () => Promise<unknown>,
    ): Promise<void> => {
      for (let attempt = 1; attempt <= SETUP_ATTEMPTS; attempt++) {
        try {
          next[key] = validateValue(key, await question());
          return;
        } catch (err) {
          if (!(err instanceof ConfigValidationError)) throw err;
          prompter.info(err.message);
        }
      }
      prompter.info(`Keeping default ${key}: ${String(next[key])}`);
    };

    await askUntilValid("storageFile", () => prompter.ask("Where should tasks be stored?", next.storageFile));
    await askUntilValid("calendar", () => prompter.choose("Calendar for task dates", CALENDAR_MODES, next.calendar));
    await askUntilValid("defaultDuration", () => prompter.ask("Default duration for new tasks", next.defaultDuration));
    await askUntilValid("backupEnabled", () => prompter.confirm("Keep automatic backups?", next.backupEnabled));
    if (next.backupEnabled) {
      await askUntilValid("backupCount", () => prompter.ask("How many backups to keep?", String(next.backupCount)));
    }

    await this.write(next);
    return this.snapshot();
  }

  /** First run without a terminal: persist the defaults as they are. */
  async initializeDefaults(): Promise<Readonly<DaybookConfig>> {
    await this.write(ConfigStore.defaults(this.homeDir));
    return this.snapshot();
  }

  get<K extends ConfigKey>(key: K): DaybookConfig[K] {
    return this._config[key];
  }

  async set(key: string, value: unknown): Promise<void> {
    if (!isConfigKey(key)) {
      throw new ConfigValidationError(key, `Unknown setting "${key}". Known settings: ${CONFIG_KEYS.join(", ")}`);
    }
    const next = { ...this._config };
    assignValue(next, key, value);
    await this.write(next);
  }

  async reset(): Promise<void> {
    await this.write(ConfigStore.defaults(this.homeDir));
  }

  snapshot(): Readonly<DaybookConfig> {
    return Object.freeze({ ...this._config });
  }

  private async write(config: DaybookConfig): Promise<void> {
    await writeFileAtomic(this.path, `${JSON.stringify(config, null, 2)}\n`);
    this._config = config;
    this._loaded = true;
  }
}

export type { ConfigKey, DaybookConfig, ThemeName } from "./types.ts";
