/**
 * Log level enumerations for the simulation system.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, lowest severity first.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which subsystem produced a log.
 */
export enum LogCategory {
  /** Daily tick orchestration */
  SIMULATION = "simulation",
  /** Villager planning and action execution */
  AI = "ai",
  /** Health, energy and happiness changes */
  NEEDS = "needs",
  /** Vendors, treasury, tannery and external trade */
  ECONOMY = "economy",
  /** Forest and river dynamics */
  WORLD = "world",
  /** Season and weather transitions */
  WEATHER = "weather",
  /** Births into the village, deaths */
  LIFECYCLE = "lifecycle",
  /** Immigration and emigration */
  MIGRATION = "migration",
  /** HTTP API */
  HTTP = "http",
  /** General/uncategorized logs */
  GENERAL = "general",
}
