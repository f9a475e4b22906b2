import chalk from "chalk";
import fs from "node:fs";
import path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { trace: 0, debug: 1, info: 2, warn: 3, error: 4 };

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
  trace: chalk.dim,
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

let threshold: LogLevel = "info";
let jsonMode = false;
let logFile: string | undefined;

export function setVerbose(v: boolean): void { threshold = v ? "trace" : "info"; }
export function setQuiet(q: boolean): void { threshold = q ? "warn" : "info"; }
export function setJsonMode(v: boolean): void { jsonMode = v; }
export function setLogFile(file: string): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  logFile = file;
}

// stdout carries the report, so log lines go to stderr
function write(level: LogLevel, msg: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  if (jsonMode) {
    const line = JSON.stringify({ level, ts: Date.now(), msg });
    console.error(line);
    if (logFile) fs.appendFileSync(logFile, line + "\n");
  } else {
    console.error(LEVEL_COLOR[level](level), msg);
    if (logFile) fs.appendFileSync(logFile, `${new Date().toISOString()} ${level} ${msg}\n`);
  }
}

export const log = {
  trace(msg: string): void { write("trace", msg); },
  debug(msg: string): void { write("debug", msg); },
  info(msg: string): void { write("info", msg); },
  warn(msg: string): void { write("warn", msg); },
  error(msg: string): void { write("error", msg); },
};
