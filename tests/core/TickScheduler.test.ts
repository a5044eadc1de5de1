import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { TickScheduler } from "../../src/domain/simulation/core/TickScheduler";
import { TickRate } from "../../src/shared/constants/SchedulerEnums";
import { logger } from "../../src/infrastructure/utils/logger";

describe("TickScheduler", () => {
  let scheduler: TickScheduler;
  let onSystemTick: ReturnType<typeof vi.fn>;
  let onTurn: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.useFakeTimers();
    onSystemTick = vi.fn();
    onTurn = vi.fn();
    scheduler = new TickScheduler(
      { [TickRate.SYSTEM]: 100, [TickRate.TURN]: 1000 },
      onSystemTick,
      onTurn,
    );
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("start/stop", () => {
    it("debe ejecutar cada tasa en su intervalo", () => {
      scheduler.start();

      vi.advanceTimersByTime(1000);

      expect(onSystemTick).toHaveBeenCalledTimes(10);
      expect(onTurn).toHaveBeenCalledTimes(1);
      expect(scheduler.running).toBe(true);
    });

    it("no debe arrancar dos veces", () => {
      const warn = vi.spyOn(logger, "warn");
      scheduler.start();
      scheduler.start();

      vi.advanceTimersByTime(1000);

      expect(onTurn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith("Scheduler already running", "simulation");
    });

    it("debe dejar de ejecutar al detenerse", () => {
      scheduler.start();
      scheduler.stop();

      vi.advanceTimersByTime(2000);

      expect(onSystemTick).not.toHaveBeenCalled();
      expect(scheduler.running).toBe(false);
    });
  });

  describe("setTimeScale", () => {
    it("debe acortar el intervalo de turnos al acelerar", () => {
      scheduler.start();
      scheduler.setTimeScale(2);

      vi.advanceTimersByTime(1000);

      expect(onTurn).toHaveBeenCalledTimes(2);
      expect(onSystemTick).toHaveBeenCalledTimes(10);
      expect(scheduler.getTimeScale()).toBe(2);
    });

    it("debe aplicar la escala al arrancar después", () => {
      scheduler.setTimeScale(0.5);
      scheduler.start();

      vi.advanceTimersByTime(1999);
      expect(onTurn).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(onTurn).toHaveBeenCalledTimes(1);
    });
  });

  describe("tick", () => {
    it("debe ejecutar los hooks alrededor del manejador", () => {
      const calls: string[] = [];
      scheduler.setHooks({
        preTick: () => calls.push("pre"),
        postTick: () => calls.push("post"),
      });
      onTurn.mockImplementation(() => calls.push("turn"));

      scheduler.tick(TickRate.TURN);

      expect(calls).toEqual(["pre", "turn", "post"]);
    });

    it("debe registrar el error y seguir contando el tick", () => {
      const error = vi.spyOn(logger, "error");
      const postTick = vi.fn();
      scheduler.setHooks({ postTick });
      onTurn.mockImplementation(() => {
        throw new Error("boom");
      });

      scheduler.tick(TickRate.TURN);

      expect(postTick).not.toHaveBeenCalled();
      expect(error).toHaveBeenCalledWith("Error in TURN tick", "simulation", {
        error: "boom",
      });
      expect(scheduler.getStats().turn.count).toBe(1);
    });

    it("debe llevar estadísticas por tasa", () => {
      scheduler.tick(TickRate.SYSTEM);
      scheduler.tick(TickRate.SYSTEM);
      scheduler.tick(TickRate.TURN);

      const stats = scheduler.getStats();

      expect(stats.system.count).toBe(2);
      expect(stats.turn.count).toBe(1);
      expect(stats.isRunning).toBe(false);
      expect(stats.timeScale).toBe(1);
    });
  });
});
