import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const ENV_KEYS = [
  "PORT",
  "TURN_INTERVAL_MS",
  "TRAIL_ID",
  "START_DATE",
  "RANDOM_SEED",
  "ALLOWED_ORIGINS",
];

async function loadConfig() {
  vi.resetModules();
  const { CONFIG } = await import("../../src/config/config");
  return CONFIG;
}

describe("Config", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
  });

  it("debe tener valores por defecto", async () => {
    const config = await loadConfig();

    expect(config.PORT).toBe(8080);
    expect(config.TICK_INTERVAL_MS).toBe(100);
    expect(config.TURN_INTERVAL_MS).toBe(1000);
    expect(config.TRAIL_ID).toBe("oregon");
    expect(config.START_DATE).toBe("1848-03-01");
    expect(config.RANDOM_SEED).toBeUndefined();
    expect(config.ALLOWED_ORIGINS).toBe("*");
  });

  it("debe usar valores de entorno cuando están disponibles", async () => {
    process.env.PORT = "3000";
    process.env.TURN_INTERVAL_MS = "250";
    process.env.RANDOM_SEED = "test-seed";
    process.env.ALLOWED_ORIGINS = "http://localhost:3000,http://localhost:5173";

    const config = await loadConfig();

    expect(config.PORT).toBe(3000);
    expect(config.TURN_INTERVAL_MS).toBe(250);
    expect(config.RANDOM_SEED).toBe("test-seed");
    expect(config.ALLOWED_ORIGINS).toEqual([
      "http://localhost:3000",
      "http://localhost:5173",
    ]);
  });

  it("debe rechazar enteros inválidos", async () => {
    process.env.PORT = "abc";

    await expect(loadConfig()).rejects.toThrow(
      'Environment variable PORT must be a positive integer, got "abc"',
    );
  });

  it("debe rechazar fechas con otro formato", async () => {
    process.env.START_DATE = "03/01/1848";

    await expect(loadConfig()).rejects.toThrow(
      'Environment variable START_DATE must use the YYYY-MM-DD format, got "03/01/1848"',
    );
  });
});
