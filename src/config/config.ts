/**
 * Application configuration loaded from environment variables.
 *
 * @module config
 */

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `Environment variable ${name} must be a positive integer, got "${raw}"`,
    );
  }
  return value;
}

function readDate(name: string, fallback: string): string {
  const raw = process.env[name] || fallback;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(raw)) {
    throw new Error(
      `Environment variable ${name} must use the YYYY-MM-DD format, got "${raw}"`,
    );
  }
  return raw;
}

/**
 * Application configuration object.
 *
 * @property {number} PORT - HTTP server port (default: 8080)
 * @property {number} TICK_INTERVAL_MS - System tick period; drains input and flushes events
 * @property {number} TURN_INTERVAL_MS - Fixed tick period; one turn is one day on the trail
 * @property {string} RANDOM_SEED - Seed for random event rolls (random when empty)
 * @property {string} TRAIL_ID - Trail loaded from the trail registry
 * @property {string} START_DATE - Calendar date of the first turn
 * @property {number} VEHICLE_BASE_MILEAGE - Miles covered per turn at a steady pace
 * @property {number} TRAIL_FIXED_LEG_DISTANCE - Leg distance produced by the fixed distance policy
 * @property {number} MAX_COMMAND_QUEUE - Commands kept before the oldest is dropped
 * @property {string[] | string} ALLOWED_ORIGINS - CORS origins
 */
export const CONFIG = {
  PORT: readInt("PORT", 8080),
  TICK_INTERVAL_MS: readInt("TICK_INTERVAL_MS", 100),
  TURN_INTERVAL_MS: readInt("TURN_INTERVAL_MS", 1000),
  RANDOM_SEED: process.env.RANDOM_SEED || undefined,
  TRAIL_ID: process.env.TRAIL_ID || "oregon",
  START_DATE: readDate("START_DATE", "1848-03-01"),
  VEHICLE_BASE_MILEAGE: readInt("VEHICLE_BASE_MILEAGE", 1),
  TRAIL_FIXED_LEG_DISTANCE: readInt("TRAIL_FIXED_LEG_DISTANCE", 1),
  MAX_COMMAND_QUEUE: readInt("MAX_COMMAND_QUEUE", 200),
  ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS?.split(",") ?? "*",
};

export type AppConfig = typeof CONFIG;
