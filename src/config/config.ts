import path from "path";
import { LogLevel } from "../shared/constants/LogEnums";

/**
 * Application configuration loaded from environment variables.
 *
 * Invalid values stop start-up with an error naming the variable.
 *
 * @module config
 */

/**
 * @property PORT - HTTP server port (default: 8080)
 * @property VILLAGE_NAME - Name given to the village on initialization
 * @property SIMULATION_SEED - Seed for the simulation's random source; a
 *   time-derived seed is used when absent
 * @property INITIAL_VILLAGERS - Founding population (default: 10)
 * @property FOREST_SIZE_SQ_KM - Forest size; the river is twice as long in km
 * @property RIVER_NAME - Name of the village river
 * @property AUTO_TICK_INTERVAL_MS - Advance one day every N ms (0 = off)
 * @property LOG_LEVEL - Minimum log level
 * @property LOG_TO_FILE - Write JSON-lines log files
 * @property LOG_DIR - Directory for log files
 * @property ALLOWED_ORIGINS - CORS origins, or "*" for any
 */
export interface AppConfig {
  readonly PORT: number;
  readonly VILLAGE_NAME: string;
  readonly SIMULATION_SEED?: string;
  readonly INITIAL_VILLAGERS: number;
  readonly FOREST_SIZE_SQ_KM: number;
  readonly RIVER_NAME: string;
  readonly AUTO_TICK_INTERVAL_MS: number;
  readonly LOG_LEVEL: LogLevel;
  readonly LOG_TO_FILE: boolean;
  readonly LOG_DIR: string;
  readonly ALLOWED_ORIGINS: string[] | "*";
}

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  isValid: (value: number) => boolean,
  expectation: string,
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`Invalid ${name}="${raw}": expected ${expectation}`);
  }
  return value;
}

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

function readLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (!value) return LogLevel.INFO;
  const level = Object.values(LogLevel).find((l) => l === value);
  if (!level) {
    throw new Error(
      `Invalid LOG_LEVEL="${raw}": expected one of ${LOG_LEVELS.join(", ")}`,
    );
  }
  return level;
}

function readOrigins(raw: string | undefined): string[] | "*" {
  if (!raw || raw.trim() === "*") return "*";
  const origins = raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length > 0 ? origins : "*";
}

export function loadConfig(env: Env): AppConfig {
  const seed = env.SIMULATION_SEED?.trim();
  return Object.freeze({
    PORT: readNumber(
      env,
      "PORT",
      8080,
      (v) => Number.isInteger(v) && v > 0 && v < 65536,
      "a port number",
    ),
    VILLAGE_NAME: env.VILLAGE_NAME?.trim() || "Greendale",
    SIMULATION_SEED: seed ? seed : undefined,
    INITIAL_VILLAGERS: readNumber(
      env,
      "INITIAL_VILLAGERS",
      10,
      (v) => Number.isInteger(v) && v > 0,
      "a positive integer",
    ),
    FOREST_SIZE_SQ_KM: readNumber(
      env,
      "FOREST_SIZE_SQ_KM",
      2,
      (v) => v > 0,
      "a positive number",
    ),
    RIVER_NAME: env.RIVER_NAME?.trim() || "Clearwater River",
    AUTO_TICK_INTERVAL_MS: readNumber(
      env,
      "AUTO_TICK_INTERVAL_MS",
      0,
      (v) => v >= 0,
      "zero or a positive number",
    ),
    LOG_LEVEL: readLogLevel(env.LOG_LEVEL),
    LOG_TO_FILE: env.LOG_TO_FILE === "true",
    LOG_DIR: env.LOG_DIR
      ? path.resolve(env.LOG_DIR)
      : path.join(process.cwd(), "logs"),
    ALLOWED_ORIGINS: readOrigins(env.ALLOWED_ORIGINS),
  });
}

export const CONFIG: AppConfig = loadConfig(process.env);
