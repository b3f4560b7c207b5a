import { pauseSpinner } from "./ui.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let currentLevel: LogLevel = "info";
let colorEnabled = true;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  bold: "\x1b[1m",
};

function c(color: keyof typeof COLORS, text: string): string {
  return colorEnabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function configureLogger(level: LogLevel, color: boolean): void {
  currentLevel = level;
  colorEnabled = color;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Pause spinner, log, resume spinner */
function withSpinnerPause(fn: () => void): void {
  const resume = pauseSpinner();
  fn();
  resume?.();
}

/**
 * Plain line on stdout, no prefix and no level gate. Used for the build
 * summary so the console matches build.info byte for byte.
 */
export function output(msg: string): void {
  withSpinnerPause(() => console.log(msg));
}

export function debug(msg: string): void {
  if (shouldLog("debug")) withSpinnerPause(() => console.log(c("gray", `[debug] ${msg}`)));
}

export function info(msg: string): void {
  if (shouldLog("info")) withSpinnerPause(() => console.log(c("cyan", "ℹ") + ` ${msg}`));
}

export function success(msg: string): void {
  if (shouldLog("info")) withSpinnerPause(() => console.log(c("green", "✓") + ` ${msg}`));
}

export function warn(msg: string): void {
  if (shouldLog("warn")) withSpinnerPause(() => console.log(c("yellow", "⚠") + ` ${msg}`));
}

export function error(msg: string): void {
  if (shouldLog("error")) withSpinnerPause(() => console.error(c("red", "✗") + ` ${msg}`));
}

export function heading(msg: string): void {
  if (shouldLog("info")) withSpinnerPause(() => console.log(c("bold", msg)));
}
