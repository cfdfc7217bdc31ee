import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

import { API_CONFIG } from "../config/api";
import { formatIsoTimestamp } from "../utils/formatters";

export type LogScope = "registry" | "dependencies" | "downloads" | "servers" | "index";
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const FLUSH_DELAY_MS = 400;

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_WEIGHT;

let minimumLevel: LogLevel = isLogLevel(API_CONFIG.logLevel) ? API_CONFIG.logLevel : "info";
let logDirectory: string | undefined = API_CONFIG.logDirectory;

const buffers = new Map<LogScope, string[]>();
const flushTimers = new Map<LogScope, ReturnType<typeof setTimeout>>();

export const configureLogging = ({
  level,
  directory,
}: {
  level?: LogLevel;
  directory?: string | null;
}) => {
  if (level) {
    minimumLevel = level;
  }
  if (directory !== undefined) {
    logDirectory = directory ?? undefined;
  }
};

const flushBuffer = async (scope: LogScope) => {
  const pending = buffers.get(scope);
  if (!pending?.length || !logDirectory) {
    return;
  }
  const payload = pending.splice(0, pending.length);
  try {
    await mkdir(logDirectory, { recursive: true });
    await appendFile(path.join(logDirectory, `${scope}.log`), `${payload.join("\n")}\n`);
  } catch (error) {
    console.error(`[logs] No se pudo escribir el log ${scope}:`, error);
  }
};

const consoleFor = (level: LogLevel) => {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
};

export const logMessage = async (
  scope: LogScope,
  level: LogLevel,
  message: string,
  { flush = false } = {},
) => {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[minimumLevel]) {
    return;
  }
  const line = `[${formatIsoTimestamp()}] [${level}] [${scope}] ${message}`;
  consoleFor(level)(line);

  if (!logDirectory) {
    return;
  }
  const pending = buffers.get(scope) ?? [];
  pending.push(line);
  buffers.set(scope, pending);

  if (flush) {
    const timer = flushTimers.get(scope);
    if (timer) {
      clearTimeout(timer);
      flushTimers.delete(scope);
    }
    await flushBuffer(scope);
    return;
  }

  if (flushTimers.has(scope)) {
    return;
  }

  const timer = setTimeout(() => {
    flushTimers.delete(scope);
    void flushBuffer(scope);
  }, FLUSH_DELAY_MS);
  timer.unref();
  flushTimers.set(scope, timer);
};

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export const createLogger = (scope: LogScope): Logger => ({
  debug: (message) => void logMessage(scope, "debug", message),
  info: (message) => void logMessage(scope, "info", message),
  warn: (message) => void logMessage(scope, "warn", message),
  error: (message) => void logMessage(scope, "error", message, { flush: true }),
});
