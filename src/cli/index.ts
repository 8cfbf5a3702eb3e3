import { ConfigStore, configKeys, isConfigKey } from "../config/config.ts";
import {
  ConfigValidationError,
  IndexOutOfRangeError,
  StorageIOError,
  TaskValidationError,
} from "../errors.ts";
import { DataManager } from "../store/data-manager.ts";
import {
  TASK_PRIORITIES,
  TASK_STATUSES,
  type ExchangeFormat,
  type Task,
  type TaskChanges,
  type TaskFilter,
  type TaskPriority,
  type TaskStatus,
} from "../store/types.ts";
import { setColorEnabled, setTheme } from "../theme/colors.ts";
import {
  accent,
  bold,
  dim,
  error,
  formatDataInfo,
  formatStatistics,
  formatTaskDetail,
  formatTaskTable,
  success,
  warn,
  type TaskRow,
} from "./format.ts";
import { CALENDAR_MODES } from "../utils/date.ts";
import { createTerminalPrompter, isInteractive, type TerminalPrompter } from "./prompt.ts";

const VERSION = "0.1.0";

// ── Exit codes ───────────────────────────────────────

const EXIT_OK = 0;
const EXIT_ERROR = 1;
const EXIT_NOT_FOUND = 2;
const EXIT_AMBIGUOUS = 3;
const EXIT_VALIDATION = 4;
const EXIT_STORAGE = 5;

// ── Arg parsing helpers ──────────────────────────────

const FLAGS_WITH_VALUE = new Set([
  "--date", "-d", "--duration", "--desc", "--name",
  "--status", "-s", "--priority", "-p", "--tag", "-t",
  "--search", "--format", "-f",
]);

type FlagReadResult =
  | { state: "absent" }
  | { state: "missing" }
  | { state: "value"; value: string };

function readFlag(args: string[], long: string, short?: string): FlagReadResult {
  for (let i = 0; i < args.length; i++) {
    const token = args[i];
    if (token === undefined) continue;
    if (token === long || (short && token === short)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("-")) {
        return { state: "missing" };
      }
      return { state: "value", value };
    }
    if (token.startsWith(long + "=")) {
      return { state: "value", value: token.slice(long.length + 1) };
    }
    if (short && token.startsWith(short + "=")) {
      return { state: "value", value: token.slice(short.length + 1) };
    }
  }
  return { state: "absent" };
}

function getFlag(args: string[], long: string, short?: string): string | undefined {
  const result = readFlag(args, long, short);
  return result.state === "value" ? result.value : undefined;
}

function findFirstMissingFlagValue(args: string[]): string | null {
  for (let i = 0; i < args.length; i++) {
    const token = args[i];
    if (token === undefined || !FLAGS_WITH_VALUE.has(token)) continue;
    const value = args[i + 1];
    if (value === undefined || value.startsWith("-")) {
      return token;
    }
  }
  return null;
}

function hasFlag(args: string[], long: string, short?: string): boolean {
  return args.some((a) => a === long || (short != null && a === short));
}

function positionalArgs(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === undefined) continue;
    if (a.startsWith("-")) {
      // skip flag value if it takes one
      if (FLAGS_WITH_VALUE.has(a) && !a.includes("=")) i++;
      continue;
    }
    result.push(a);
  }
  return result;
}

// ── Validators ───────────────────────────────────────

function isStatus(val: string): val is TaskStatus {
  return TASK_STATUSES.some((s) => s === val);
}

function isPriority(val: string): val is TaskPriority {
  return TASK_PRIORITIES.some((p) => p === val);
}

function parseFormat(val: string | undefined): ExchangeFormat | undefined | null {
  if (val === undefined) return undefined;
  if (val === "csv" || val === "json") return val;
  return null;
}

// ── Row reference resolution ─────────────────────────

type ResolveResult =
  | { ok: true; row: TaskRow }
  | { ok: false; code: number };

/** A 1-based row number as shown by `list`, or a unique id prefix containing a non-digit. */
function resolveTask(tasks: readonly Task[], ref: string): ResolveResult {
  const trimmed = ref.trim();
  if (trimmed === "") {
    error("Task reference cannot be empty");
    return { ok: false, code: EXIT_VALIDATION };
  }

  // All digits is always a row number, never an id prefix
  if (/^\d+$/.test(trimmed)) {
    const n = Number(trimmed);
    const task = n >= 1 ? tasks[n - 1] : undefined;
    if (task) return { ok: true, row: { index: n - 1, task } };
    error(
      tasks.length === 0
        ? `No task at row ${trimmed}: the list is empty`
        : `No task at row ${trimmed}: rows run from 1 to ${tasks.length}`,
    );
    return { ok: false, code: EXIT_NOT_FOUND };
  }

  const lowered = trimmed.toLowerCase();
  const matches: TaskRow[] = [];
  tasks.forEach((task, index) => {
    if (task.id.toLowerCase().startsWith(lowered)) matches.push({ index, task });
  });

  const [only] = matches;
  if (matches.length === 1 && only) return { ok: true, row: only };
  if (matches.length === 0) {
    error(`Task not found: "${trimmed}" (use a row number from 'daybook list' or an id prefix)`);
    return { ok: false, code: EXIT_NOT_FOUND };
  }
  error(`Ambiguous id "${trimmed}" matches ${matches.length} tasks:`);
  for (const m of matches) {
    console.error(`  ${dim(m.task.id.slice(0, 12))}  ${m.task.name}`);
  }
  return { ok: false, code: EXIT_AMBIGUOUS };
}

function rowsOf(all: readonly Task[], subset: readonly Task[]): TaskRow[] {
  const positions = new Map(all.map((t, i) => [t.id, i]));
  return subset.map((task) => ({ index: positions.get(task.id) ?? -1, task }));
}

// ── Help texts ───────────────────────────────────────

const HELP_MAIN = `daybook — terminal task log v${VERSION}

Usage:
  daybook add <name> [flags]        Add a task (date defaults to today)
  daybook list [flags]              List tasks with row numbers
  daybook today                     Tasks dated today
  daybook show <row|id>             Show task details
  daybook edit <row|id> [flags]     Change fields of a task
  daybook rm <row|id> [--force]     Delete a task
  daybook search <query>            Search name, description and tags
  daybook stats [--json]            Counts and tracked time
  daybook export <path> [--format csv|json]
  daybook import <path> [--format csv|json]
  daybook clear [--yes]             Delete every task (a backup is kept)
  daybook backup [create|list|restore <seq|path>]
  daybook info                      Storage file details
  daybook config <list|get|set|reset|path>
  daybook setup                     Run the first-time setup again

Rows are numbered from 1 in file order. Numbers shift after add/rm,
so list again before editing or deleting.

Flags:
  -h, --help                        Show this help
  -v, --version                     Show version
  --no-color                        Disable color output`;

const HELP_ADD = `Usage: daybook add <name> [flags]

Flags:
  -d, --date <date>        YYYY-MM-DD in the configured calendar (default: today)
      --duration <expr>    2h, 30min, 1h 30min (default: config defaultDuration)
      --desc <text>        Description
  -s, --status <status>    pending|in-progress|completed (default: completed)
  -p, --priority <level>   low|medium|high (default: medium)
  -t, --tag <tags>         Comma-separated tags`;

const HELP_LIST = `Usage: daybook list [flags]

Flags:
  -d, --date <date>        Exact date
  -s, --status <status>    pending|in-progress|completed
  -p, --priority <level>   low|medium|high
  -t, --tag <tag>          Tasks carrying this tag
      --search <text>      Substring of name, description or tags
      --json               Output as JSON`;

const HELP_EDIT = `Usage: daybook edit <row|id> [flags]

Flags:
      --name <text>        New name
  -d, --date <date>        New date
      --duration <expr>    New duration
      --desc <text>        New description
  -s, --status <status>    New status
  -p, --priority <level>   New priority
  -t, --tag <tags>         Replace tags (comma-separated, "" clears)`;

// ── Context ──────────────────────────────────────────

interface CliContext {
  config: ConfigStore;
  prompter: () => TerminalPrompter;
}

async function openData(ctx: CliContext): Promise<DataManager> {
  return DataManager.open(ctx.config, { onWarning: (w) => warn(w.message) });
}

/** null when the action may go ahead, otherwise the exit code to return. */
async function confirmOrCancel(ctx: CliContext, skip: boolean, question: string): Promise<number | null> {
  if (skip) return null;
  if (!isInteractive()) {
    error("Refusing to continue without confirmation; pass --force to skip the prompt");
    return EXIT_ERROR;
  }
  if (await ctx.prompter().confirm(question, false)) return null;
  console.log("Cancelled.");
  return EXIT_OK;
}

function readStatusFlag(args: string[]): TaskStatus | undefined | null {
  const val = getFlag(args, "--status", "-s");
  if (val === undefined) return undefined;
  const normalized = val.trim().toLowerCase();
  if (!isStatus(normalized)) {
    error(`Invalid status: "${val}". Must be ${TASK_STATUSES.join("|")}`);
    return null;
  }
  return normalized;
}

function readPriorityFlag(args: string[]): TaskPriority | undefined | null {
  const val = getFlag(args, "--priority", "-p");
  if (val === undefined) return undefined;
  const normalized = val.trim().toLowerCase();
  if (!isPriority(normalized)) {
    error(`Invalid priority: "${val}". Must be ${TASK_PRIORITIES.join("|")}`);
    return null;
  }
  return normalized;
}

// ── Subcommand handlers ──────────────────────────────

async function cmdAdd(ctx: CliContext, args: string[]): Promise<number> {
  if (hasFlag(args, "--help", "-h")) { console.log(HELP_ADD); return EXIT_OK; }

  const name = positionalArgs(args).join(" ");
  if (!name.trim()) {
    error("Missing required argument: <name>");
    console.error("Usage: daybook add <name> [flags]");
    return EXIT_VALIDATION;
  }

  const data = await openData(ctx);
  const task = await data.add({
    name,
    date: getFlag(args, "--date", "-d") ?? data.today(),
    duration: getFlag(args, "--duration"),
    description: getFlag(args, "--desc"),
    status: getFlag(args, "--status", "-s"),
    priority: getFlag(args, "--priority", "-p"),
    tags: getFlag(args, "--tag", "-t"),
  });

  success(`Added row ${data.size}: "${task.name}" (id: ${task.id.slice(0, 8)})`);
  return EXIT_OK;
}

async function cmdList(ctx: CliContext, args: string[]): Promise<number> {
  if (hasFlag(args, "--help", "-h")) { console.log(HELP_LIST); return EXIT_OK; }

  const status = readStatusFlag(args);
  if (status === null) return EXIT_VALIDATION;
  const priority = readPriorityFlag(args);
  if (priority === null) return EXIT_VALIDATION;

  const filter: TaskFilter = {
    date: getFlag(args, "--date", "-d"),
    search: getFlag(args, "--search"),
    tag: getFlag(args, "--tag", "-t"),
    status,
    priority,
  };

  const data = await openData(ctx);
  const all = data.list();
  const tasks = data.filter(filter);
  printTasks(all, tasks, args, ctx.config.get("calendar"));
  return EXIT_OK;
}

async function cmdToday(ctx: CliContext, args: string[]): Promise<number> {
  const data = await openData(ctx);
  const tasks = data.getToday();
  if (!hasFlag(args, "--json")) console.log(bold(`  Today: ${data.today()}`));
  printTasks(data.list(), tasks, args, ctx.config.get("calendar"));
  return EXIT_OK;
}

async function cmdSearch(ctx: CliContext, args: string[]): Promise<number> {
  if (hasFlag(args, "--help", "-h")) {
    console.log("Usage: daybook search <query> [--json]");
    return EXIT_OK;
  }

  const query = positionalArgs(args).join(" ");
  if (!query.trim()) {
    error("Missing required argument: <query>");
    return EXIT_VALIDATION;
  }

  const data = await openData(ctx);
  printTasks(data.list(), data.filter({ search: query }), args, ctx.config.get("calendar"));
  return EXIT_OK;
}

function printTasks(all: readonly Task[], tasks: readonly Task[], args: string[], calendar: "gregorian" | "jalali"): void {
  if (hasFlag(args, "--json")) {
    console.log(JSON.stringify(tasks, null, 2));
  } else {
    console.log(formatTaskTable(rowsOf(all, tasks), calendar));
  }
}

async function cmdShow(ctx: CliContext, args: string[]): Promise<number> {
  const ref = positionalArgs(args)[0];
  if (ref === undefined) {
    error("Missing required argument: <row|id>");
    return EXIT_VALIDATION;
  }

  const data = await openData(ctx);
  const result = resolveTask(data.list(), ref);
  if (!result.ok) return result.code;

  console.log(formatTaskDetail(result.row, ctx.config.get("calendar")));
  return EXIT_OK;
}

async function cmdEdit(ctx: CliContext, args: string[]): Promise<number> {
  if (hasFlag(args, "--help", "-h")) { console.log(HELP_EDIT); return EXIT_OK; }

  const ref = positionalArgs(args)[0];
  if (ref === undefined) {
    error("Missing required argument: <row|id>");
    return EXIT_VALIDATION;
  }

  const changes: TaskChanges = {
    name: getFlag(args, "--name"),
    date: getFlag(args, "--date", "-d"),
    duration: getFlag(args, "--duration"),
    description: getFlag(args, "--desc"),
    status: getFlag(args, "--status", "-s"),
    priority: getFlag(args, "--priority", "-p"),
    tags: getFlag(args, "--tag", "-t"),
  };
  if (Object.values(changes).every((v) => v === undefined)) {
    error("Nothing to change. Run 'daybook edit --help' for flags");
    return EXIT_VALIDATION;
  }

  const data = await openData(ctx);
  const result = resolveTask(data.list(), ref);
  if (!result.ok) return result.code;

  const updated = await data.edit(result.row.index, changes);
  success(`Updated row ${result.row.index + 1}: "${updated.name}"`);
  return EXIT_OK;
}

async function cmdRm(ctx: CliContext, args: string[]): Promise<number> {
  const ref = positionalArgs(args)[0];
  if (ref === undefined) {
    error("Missing required argument: <row|id>");
    return EXIT_VALIDATION;
  }

  const data = await openData(ctx);
  const result = resolveTask(data.list(), ref);
  if (!result.ok) return result.code;

  const declined = await confirmOrCancel(ctx, hasFlag(args, "--force"), `Delete "${result.row.task.name}"?`);
  if (declined !== null) return declined;

  const removed = await data.delete(result.row.index);
  success(`Deleted row ${result.row.index + 1}: "${removed.name}"`);
  if (result.row.index < data.size) {
    console.log(dim("  Rows after it moved up by one; list again before the next edit."));
  }
  return EXIT_OK;
}

async function cmdStats(ctx: CliContext, args: string[]): Promise<number> {
  const data = await openData(ctx);
  const stats = data.statistics();
  if (hasFlag(args, "--json")) {
    console.log(JSON.stringify(stats, null, 2));
  } else {
    console.log(formatStatistics(stats));
  }
  return EXIT_OK;
}

async function cmdInfo(ctx: CliContext): Promise<number> {
  const data = await openData(ctx);
  console.log(formatDataInfo(await data.info()));
  return EXIT_OK;
}

async function cmdExport(ctx: CliContext, args: string[]): Promise<number> {
  const path = positionalArgs(args)[0];
  if (path === undefined) {
    error("Usage: daybook export <path> [--format csv|json]");
    return EXIT_VALIDATION;
  }
  const format = parseFormat(getFlag(args, "--format", "-f"));
  if (format === null) {
    error("Unknown format. Use csv or json");
    return EXIT_VALIDATION;
  }

  const data = await openData(ctx);
  const count = await data.exportData(path, format);
  success(`Exported ${count} task(s) to ${path}`);
  return EXIT_OK;
}

async function cmdImport(ctx: CliContext, args: string[]): Promise<number> {
  const path = positionalArgs(args)[0];
  if (path === undefined) {
    error("Usage: daybook import <path> [--format csv|json]");
    return EXIT_VALIDATION;
  }
  const format = parseFormat(getFlag(args, "--format", "-f"));
  if (format === null) {
    error("Unknown format. Use csv or json");
    return EXIT_VALIDATION;
  }

  const data = await openData(ctx);
  const result = await data.importData(path, format);
  success(`Imported ${result.imported} task(s), skipped ${result.skipped}`);
  return EXIT_OK;
}

async function cmdClear(ctx: CliContext, args: string[]): Promise<number> {
  const data = await openData(ctx);
  if (data.size === 0) {
    console.log(dim("  No tasks to clear."));
    return EXIT_OK;
  }

  const skipPrompt = hasFlag(args, "--yes", "-y") || hasFlag(args, "--force");
  const declined = await confirmOrCancel(ctx, skipPrompt, `Delete ALL ${data.size} tasks? A backup is kept.`);
  if (declined !== null) return declined;

  const count = await data.clearAll();
  success(`Cleared ${count} task(s)`);
  return EXIT_OK;
}

async function cmdBackup(ctx: CliContext, args: string[]): Promise<number> {
  const pos = positionalArgs(args);
  const sub = pos[0] ?? "create";
  const data = await openData(ctx);

  switch (sub) {
    case "create": {
      const path = await data.backup();
      success(`Backup written to ${path}`);
      return EXIT_OK;
    }
    case "list": {
      const backups = await data.listBackups();
      if (backups.length === 0) {
        console.log(dim("  No backups yet."));
        return EXIT_OK;
      }
      for (const b of backups) {
        console.log(`  ${accent(String(b.sequence).padStart(4))}  ${dim(b.createdAt)}  ${b.path}`);
      }
      return EXIT_OK;
    }
    case "restore": {
      const ref = pos[1];
      if (ref === undefined) {
        error("Usage: daybook backup restore <seq|path>");
        return EXIT_VALIDATION;
      }
      let path = ref;
      if (/^\d+$/.test(ref)) {
        const entry = (await data.listBackups()).find((b) => b.sequence === Number(ref));
        if (!entry) {
          error(`No backup with sequence ${ref}`);
          return EXIT_NOT_FOUND;
        }
        path = entry.path;
      }
      const declined = await confirmOrCancel(ctx, hasFlag(args, "--force"), `Replace all ${data.size} tasks with ${path}?`);
      if (declined !== null) return declined;
      const result = await data.restore(path);
      success(`Restored ${result.imported} task(s) from ${path}`);
      return EXIT_OK;
    }
    default:
      error("Usage: daybook backup [create|list|restore <seq|path>]");
      return EXIT_VALIDATION;
  }
}

async function cmdConfig(ctx: CliContext, args: string[]): Promise<number> {
  const pos = positionalArgs(args);
  const sub = pos[0] ?? "list";

  switch (sub) {
    case "get": {
      const key = pos[1];
      if (!key) { error("Usage: daybook config get <key>"); return EXIT_VALIDATION; }
      if (!isConfigKey(key)) {
        error(`Unknown setting "${key}". Known settings: ${configKeys().join(", ")}`);
        return EXIT_VALIDATION;
      }
      console.log(String(ctx.config.get(key)));
      return EXIT_OK;
    }
    case "set": {
      const key = pos[1];
      const value = pos[2];
      if (!key || value === undefined) { error("Usage: daybook config set <key> <value>"); return EXIT_VALIDATION; }
      const calendar = key === "calendar" ? CALENDAR_MODES.find((m) => m === value.trim().toLowerCase()) : undefined;
      if (calendar !== undefined) {
        // Stored dates move with the calendar
        const data = await openData(ctx);
        const converted = await data.changeCalendar(calendar);
        success(`Set calendar = ${calendar} (${converted} task date(s) converted)`);
        return EXIT_OK;
      }
      await ctx.config.set(key, value);
      success(`Set ${key} = ${isConfigKey(key) ? String(ctx.config.get(key)) : value}`);
      return EXIT_OK;
    }
    case "list": {
      const snapshot = ctx.config.snapshot();
      for (const key of configKeys()) {
        console.log(`  ${bold(key.padEnd(16))} ${String(snapshot[key])}`);
      }
      return EXIT_OK;
    }
    case "reset": {
      const declined = await confirmOrCancel(ctx, hasFlag(args, "--force"), "Reset config to defaults?");
      if (declined !== null) return declined;
      await ctx.config.reset();
      success("Config reset to defaults");
      return EXIT_OK;
    }
    case "path":
      console.log(ctx.config.path);
      return EXIT_OK;
    default:
      error("Usage: daybook config <list|get|set|reset|path>");
      return EXIT_VALIDATION;
  }
}

async function cmdSetup(ctx: CliContext): Promise<number> {
  if (!isInteractive()) {
    error("Setup needs an interactive terminal. Use 'daybook config set <key> <value>' instead");
    return EXIT_ERROR;
  }
  const config = await ctx.config.runFirstTimeSetup(ctx.prompter());
  success(`Settings saved to ${ctx.config.path}`);
  console.log(dim(`  Tasks file: ${config.storageFile}`));
  return EXIT_OK;
}

// ── Startup ──────────────────────────────────────────

// Commands that can repair a settings file that fails validation
function repairsConfig(subcommand: string, args: string[]): boolean {
  if (subcommand === "setup") return true;
  const action = positionalArgs(args)[0];
  return subcommand === "config" && (action === "set" || action === "reset" || action === "path");
}

async function prepareConfig(ctx: CliContext, subcommand: string, args: string[]): Promise<void> {
  const result = await ctx.config.load().catch((err: unknown) => {
    if (!(err instanceof ConfigValidationError) || !repairsConfig(subcommand, args)) throw err;
    warn(`${err.message}; continuing with default settings`);
    return null;
  });
  if (result === null || result.status === "loaded" || subcommand === "setup") return;

  if (isInteractive()) {
    const config = await ctx.config.runFirstTimeSetup(ctx.prompter());
    success(`Settings saved to ${ctx.config.path}`);
    console.log(dim(`  Tasks file: ${config.storageFile}`));
  } else {
    await ctx.config.initializeDefaults();
    console.error(dim(`[daybook] First run: default settings written to ${ctx.config.path}`));
  }
}

function exitCodeFor(err: unknown): number {
  if (err instanceof TaskValidationError || err instanceof ConfigValidationError) return EXIT_VALIDATION;
  if (err instanceof IndexOutOfRangeError) return EXIT_NOT_FOUND;
  if (err instanceof StorageIOError) return EXIT_STORAGE;
  return EXIT_ERROR;
}

// ── Main entry ───────────────────────────────────────

export interface RunOptions {
  /** Settings directory; defaults to $DAYBOOK_HOME or ~/.daybook */
  homeDir?: string;
}

export async function runCLI(args: string[], options: RunOptions = {}): Promise<number> {
  // Global flags
  const noColor = hasFlag(args, "--no-color") || !!process.env.NO_COLOR;
  setColorEnabled(!noColor);

  const missingFlag = findFirstMissingFlagValue(args);
  if (missingFlag) {
    error(`Missing value for ${missingFlag}`);
    return EXIT_VALIDATION;
  }

  if (hasFlag(args, "--version", "-v")) {
    console.log(`daybook v${VERSION}`);
    return EXIT_OK;
  }

  const subcommand = positionalArgs(args)[0];
  if (!subcommand) {
    console.log(HELP_MAIN);
    return EXIT_OK;
  }

  // Remove subcommand from args for sub-handlers
  const subIdx = args.indexOf(subcommand);
  const handlerArgs = [...args.slice(0, subIdx), ...args.slice(subIdx + 1)];

  const session: { prompter: TerminalPrompter | null } = { prompter: null };
  const ctx: CliContext = {
    config: new ConfigStore({ homeDir: options.homeDir }),
    prompter: () => (session.prompter ??= createTerminalPrompter()),
  };

  try {
    await prepareConfig(ctx, subcommand, handlerArgs);
    setTheme(ctx.config.get("theme"));

    switch (subcommand) {
      case "add": return await cmdAdd(ctx, handlerArgs);
      case "list": case "ls": return await cmdList(ctx, handlerArgs);
      case "today": return await cmdToday(ctx, handlerArgs);
      case "show": return await cmdShow(ctx, handlerArgs);
      case "edit": return await cmdEdit(ctx, handlerArgs);
      case "rm": case "remove": case "delete": return await cmdRm(ctx, handlerArgs);
      case "search": return await cmdSearch(ctx, handlerArgs);
      case "stats": return await cmdStats(ctx, handlerArgs);
      case "info": return await cmdInfo(ctx);
      case "export": return await cmdExport(ctx, handlerArgs);
      case "import": return await cmdImport(ctx, handlerArgs);
      case "clear": return await cmdClear(ctx, handlerArgs);
      case "backup": return await cmdBackup(ctx, handlerArgs);
      case "config": return await cmdConfig(ctx, handlerArgs);
      case "setup": return await cmdSetup(ctx);
      default:
        error(`Unknown command: "${subcommand}"`);
        console.error("Run 'daybook --help' for usage.");
        return EXIT_ERROR;
    }
  } catch (err) {
    error(err instanceof Error ? err.message : String(err));
    return exitCodeFor(err);
  } finally {
    session.prompter?.close();
  }
}
