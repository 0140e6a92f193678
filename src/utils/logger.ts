import pino from "pino";
import { getConfig } from "../config.js";

export type Logger = pino.Logger;

function getModuleName(module: string | ImportMeta): string {
  const moduleUrl = typeof module === "string" ? module : module.url;
  const lastSlashIndex = moduleUrl.lastIndexOf("/");
  const fileNameWithExtension =
    lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
  const parts = fileNameWithExtension.split(".");
  return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

const LEVEL_NAMES: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const pad = (n: number) => n.toString().padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** stdout carries the XML, so every log line goes to stderr. */
function prettyDestination(): pino.DestinationStream {
  return {
    write(chunk: string): void {
      let line: string;
      try {
        const obj: unknown = JSON.parse(chunk);
        line = formatLine(obj) ?? chunk;
      } catch {
        line = chunk;
      }
      process.stderr.write(line.endsWith("\n") ? line : `${line}\n`);
    },
  };
}

const LINE_FIELDS = new Set(["time", "level", "module", "msg", "pid", "hostname"]);

/** `[time] LEVEL module - msg`, then any other bound fields as JSON. */
export function formatLine(obj: unknown): string | undefined {
  if (typeof obj !== "object" || obj === null) return undefined;
  const time = "time" in obj && typeof obj.time === "number" ? obj.time : Date.now();
  const level = "level" in obj && typeof obj.level === "number" ? obj.level : 0;
  const moduleName = "module" in obj && typeof obj.module === "string" ? obj.module : "unknown";
  const msg = "msg" in obj && typeof obj.msg === "string" ? obj.msg : "";
  const line = `[${formatTime(time)}] ${LEVEL_NAMES[level] ?? "LOG"} ${moduleName} - ${msg}`;

  const extra = Object.entries(obj).filter(([key]) => !LINE_FIELDS.has(key));
  return extra.length > 0 ? `${line} ${JSON.stringify(Object.fromEntries(extra))}` : line;
}

let rootLogger: pino.Logger | undefined;

function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    const config = getConfig();
    rootLogger = pino(
      { level: config.LOG_LEVEL },
      config.LOG_PRETTY ? prettyDestination() : pino.destination(2),
    );
  }
  return rootLogger;
}

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * To use in a module, call `getLog(import.meta)` near the top of the file (after imports).
 *
 * @param module the module meta or module name
 */
export function getLog(module: string | ImportMeta): Logger {
  const moduleName = getModuleName(module);
  return getRootLogger().child({ module: moduleName });
}

/**
 * Log an error with proper formatting
 */
export function logError(logger: Logger, err: unknown, message: string): void {
  if (err instanceof Error) {
    logger.error({ err }, message);
  } else {
    logger.error({ err: String(err) }, message);
  }
}

/**
 * Reset the logger (useful for testing)
 */
export function resetLogger(): void {
  rootLogger = undefined;
}
