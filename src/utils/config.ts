import { config as parseDotenv } from "dotenv";
import {
  DEFAULT_CAPACITY,
  DEFAULT_DEBUG_LOG_MAX_BYTES,
} from "./constants";
import type { Level } from "./logger";

export type CacheConfig = {
  logLevel: Level;
  debugLogFile?: string;
  debugLogMaxBytes: number;
  defaultCapacity: number;
};

const parseLevel = (value: string | undefined): Level => {
  if (value === "debug") {
    return "debug";
  }
  if (value === "info") {
    return "info";
  }
  if (value === "warn") {
    return "warn";
  }
  if (value === "error") {
    return "error";
  }
  return "info";
};

const parsePositiveInteger = (
  value: string | undefined,
  fallback: number
): number => {
  const parsed = Number(value ?? fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

/**
 * Env helpers
 */
export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env
): CacheConfig => {
  const {
    LOG_LEVEL,
    DEBUG_LOG_FILE,
    DEBUG_LOG_MAX_BYTES,
    LRU_CACHE_DEFAULT_CAPACITY,
  } = env;
  return {
    logLevel: parseLevel(LOG_LEVEL),
    debugLogFile: DEBUG_LOG_FILE || undefined,
    debugLogMaxBytes: parsePositiveInteger(
      DEBUG_LOG_MAX_BYTES,
      DEFAULT_DEBUG_LOG_MAX_BYTES
    ),
    defaultCapacity: parsePositiveInteger(
      LRU_CACHE_DEFAULT_CAPACITY,
      DEFAULT_CAPACITY
    ),
  };
};

/**
 * Reads a `.env` file without writing it into `process.env`; importing the
 * library leaves the host's environment untouched. A missing file reads as
 * empty.
 */
export const readEnvFile = (path?: string): NodeJS.ProcessEnv =>
  parseDotenv({ path, processEnv: {} }).parsed ?? {};

// Real environment variables win over the file, as with dotenv itself
export const config = loadConfig({ ...readEnvFile(), ...process.env });
