import type { ThemeName } from "../config/types.ts";
import type { TaskPriority, TaskStatus } from "../store/types.ts";

export interface ThemeColors {
  fg: string;
  fgDim: string;
  accent: string;
  green: string;
  yellow: string;
  red: string;
  cyan: string;
  priority: Record<TaskPriority, string>;
  status: Record<TaskStatus, string>;
}

const defaultTheme: ThemeColors = {
  fg: "#d0d0d0",
  fgDim: "#808080",
  accent: "#5f87ff",
  green: "#5fd75f",
  yellow: "#d7af00",
  red: "#ff5f5f",
  cyan: "#5fd7d7",
  priority: { high: "#ff5f5f", medium: "#d7af00", low: "#5fd7d7" },
  status: { pending: "#808080", "in-progress": "#d7af00", completed: "#5fd75f" },
};

const tokyoNight: ThemeColors = {
  fg: "#c0caf5",
  fgDim: "#565f89",
  accent: "#7aa2f7",
  green: "#9ece6a",
  yellow: "#e0af68",
  red: "#f7768e",
  cyan: "#7dcfff",
  priority: { high: "#ff9e64", medium: "#e0af68", low: "#7dcfff" },
  status: { pending: "#565f89", "in-progress": "#e0af68", completed: "#9ece6a" },
};

const catppuccin: ThemeColors = {
  fg: "#cdd6f4",
  fgDim: "#6c7086",
  accent: "#89b4fa",
  green: "#a6e3a1",
  yellow: "#f9e2af",
  red: "#f38ba8",
  cyan: "#89dceb",
  priority: { high: "#fab387", medium: "#f9e2af", low: "#89dceb" },
  status: { pending: "#6c7086", "in-progress": "#f9e2af", completed: "#a6e3a1" },
};

const gruvbox: ThemeColors = {
  fg: "#ebdbb2",
  fgDim: "#928374",
  accent: "#83a598",
  green: "#b8bb26",
  yellow: "#fabd2f",
  red: "#fb4934",
  cyan: "#8ec07c",
  priority: { high: "#fe8019", medium: "#fabd2f", low: "#83a598" },
  status: { pending: "#928374", "in-progress": "#fabd2f", completed: "#b8bb26" },
};

const nord: ThemeColors = {
  fg: "#d8dee9",
  fgDim: "#4c566a",
  accent: "#88c0d0",
  green: "#a3be8c",
  yellow: "#ebcb8b",
  red: "#bf616a",
  cyan: "#8fbcbb",
  priority: { high: "#d08770", medium: "#ebcb8b", low: "#88c0d0" },
  status: { pending: "#4c566a", "in-progress": "#ebcb8b", completed: "#a3be8c" },
};

const dracula: ThemeColors = {
  fg: "#f8f8f2",
  fgDim: "#6272a4",
  accent: "#bd93f9",
  green: "#50fa7b",
  yellow: "#f1fa8c",
  red: "#ff5555",
  cyan: "#8be9fd",
  priority: { high: "#ffb86c", medium: "#f1fa8c", low: "#8be9fd" },
  status: { pending: "#6272a4", "in-progress": "#f1fa8c", completed: "#50fa7b" },
};

const solarizedDark: ThemeColors = {
  fg: "#839496",
  fgDim: "#586e75",
  accent: "#268bd2",
  green: "#859900",
  yellow: "#b58900",
  red: "#dc322f",
  cyan: "#2aa198",
  priority: { high: "#cb4b16", medium: "#b58900", low: "#268bd2" },
  status: { pending: "#586e75", "in-progress": "#b58900", completed: "#859900" },
};

export const THEMES: Record<ThemeName, ThemeColors> = {
  default: defaultTheme,
  "tokyo-night": tokyoNight,
  catppuccin,
  gruvbox,
  nord,
  dracula,
  "solarized-dark": solarizedDark,
};
