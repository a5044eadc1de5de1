/**
 * Log level enumerations for the simulation system.
 *
 * Defines all log levels used in the logging system.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which system generated the log.
 * Useful for filtering and analyzing behavior by subsystem.
 */
export enum LogCategory {
  /** Core simulation runner and tick loop */
  SIMULATION = "simulation",
  /** Trail progress, arrivals and forks */
  TRAIL = "trail",
  /** Mode stack and attached states */
  MODES = "modes",
  /** Vehicle, pace and inventory */
  VEHICLE = "vehicle",
  /** Random events and event history */
  EVENTS = "events",
  /** Player input buffer */
  INPUT = "input",
  /** HTTP and WebSocket surface */
  HTTP = "http",
  /** General/uncategorized logs */
  GENERAL = "general",
}
