import { appendFileSync, mkdirSync, statSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { inspect } from "node:util";
import { config } from "./config";
import { DEFAULT_DEBUG_LOG_MAX_BYTES } from "./constants";

export type Level = "debug" | "info" | "warn" | "error";

export type LoggerSettings = {
  logLevel: Level;
  debugLogFile?: string;
  debugLogMaxBytes?: number;
};

export type Logger = {
  debug: (...parts: unknown[]) => void;
  info: (...parts: unknown[]) => void;
  warn: (...parts: unknown[]) => void;
  error: (...parts: unknown[]) => void;
  isDebugEnabled: () => boolean;
};

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const serialize = (arg: unknown): string => {
  if (typeof arg === "string") {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return inspect(arg, { depth: 3, breakLength: 120 });
  }
};

const writeConsole = (line: string, level: Level): void => {
  if (level === "error" || level === "warn") {
    process.stderr.write(line);
    return;
  }
  process.stdout.write(line);
};

/**
 * Appends every line to a file, truncating it once the next line would
 * push it past `maxBytes`. The channel shuts itself off after the first
 * failed write.
 */
const debugFileWriter = (filePath: string, maxBytes: number) => {
  let initialized = false;
  let disabled = false;
  let size = 0;

  const init = (): void => {
    initialized = true;
    mkdirSync(dirname(filePath), { recursive: true });
    try {
      size = statSync(filePath).size;
    } catch {
      // Not created yet
      size = 0;
    }
  };

  return (line: string): void => {
    if (disabled) {
      return;
    }
    try {
      if (!initialized) {
        init();
      }
      const bytes = Buffer.byteLength(line);
      if (size + bytes > maxBytes) {
        writeFileSync(filePath, "");
        size = 0;
      }
      appendFileSync(filePath, line);
      size += bytes;
    } catch (error) {
      disabled = true;
      process.stderr.write(
        `${new Date().toISOString()} [WARN] [Cache] Debug log file disabled: ${serialize(error)}\n`
      );
    }
  };
};

export const createLogger = (settings: LoggerSettings): Logger => {
  const shouldLog = (level: Level): boolean =>
    levelOrder[level] >= levelOrder[settings.logLevel];

  const writeDebugFile = settings.debugLogFile
    ? debugFileWriter(
        settings.debugLogFile,
        settings.debugLogMaxBytes ?? DEFAULT_DEBUG_LOG_MAX_BYTES
      )
    : undefined;

  const write = (level: Level, parts: unknown[]) => {
    const ts = new Date().toISOString();
    const msg = parts.map(serialize).join(" ");
    const line = `${ts} [${level.toUpperCase()}] [Cache] ${msg}\n`;
    writeDebugFile?.(line);
    if (!shouldLog(level)) {
      return;
    }
    writeConsole(line, level);
  };

  return {
    debug: (...parts: unknown[]) => write("debug", parts),
    info: (...parts: unknown[]) => write("info", parts),
    warn: (...parts: unknown[]) => write("warn", parts),
    error: (...parts: unknown[]) => write("error", parts),
    isDebugEnabled: () => settings.logLevel === "debug",
  };
};

export const logger = createLogger(config);

export const prefixedLogger = (prefix: string, base: Logger = logger) => {
  const add = (parts: unknown[]) => [`[${prefix}]`, ...parts];
  return {
    debug: (...parts: unknown[]) => base.debug(...add(parts)),
    info: (...parts: unknown[]) => base.info(...add(parts)),
    warn: (...parts: unknown[]) => base.warn(...add(parts)),
    error: (...parts: unknown[]) => base.error(...add(parts)),
  } as const;
};
