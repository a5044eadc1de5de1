import { performance } from "node:perf_hooks";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import { TickRate } from "../../../shared/constants/SchedulerEnums";

export interface TickRates {
  /** System tick period in milliseconds */
  [TickRate.SYSTEM]: number;
  /** Turn period in milliseconds, before the time scale is applied */
  [TickRate.TURN]: number;
}

/**
 * Hooks run around every tick of either rate.
 */
export interface SchedulerHooks {
  preTick?: () => void;
  postTick?: () => void;
}

interface RateStats {
  count: number;
  totalMs: number;
  avgMs: number;
}

export interface SchedulerStatsSnapshot {
  system: RateStats;
  turn: RateStats;
  isRunning: boolean;
  timeScale: number;
}

/**
 * Two-rate scheduler for the game loop.
 *
 * - SYSTEM: frequent tick that only services input and events
 * - TURN: slower fixed tick that advances the simulation one turn
 *
 * Ticks run to completion synchronously; a tick never starts while another
 * is still running.
 */
export class TickScheduler {
  private systemHandle?: NodeJS.Timeout;
  private turnHandle?: NodeJS.Timeout;
  private isRunning = false;
  private timeScale = 1;
  private hooks: SchedulerHooks = {};
  private readonly handlers: Record<TickRate, () => void>;

  private stats: Record<TickRate, RateStats> = {
    [TickRate.SYSTEM]: { count: 0, totalMs: 0, avgMs: 0 },
    [TickRate.TURN]: { count: 0, totalMs: 0, avgMs: 0 },
  };

  constructor(
    private readonly tickRates: TickRates,
    onSystemTick: () => void,
    onTurn: () => void,
  ) {
    this.handlers = {
      [TickRate.SYSTEM]: onSystemTick,
      [TickRate.TURN]: onTurn,
    };
  }

  public setHooks(hooks: SchedulerHooks): void {
    this.hooks = hooks;
  }

  public start(): void {
    if (this.isRunning) {
      logger.warn("Scheduler already running", LogCategory.SIMULATION);
      return;
    }

    this.isRunning = true;
    this.systemHandle = setInterval(
      () => this.tick(TickRate.SYSTEM),
      this.tickRates[TickRate.SYSTEM],
    );
    this.scheduleTurns();

    logger.info("Scheduler started", LogCategory.SIMULATION, {
      systemMs: this.tickRates[TickRate.SYSTEM],
      turnMs: this.turnInterval(),
    });
  }

  public stop(): void {
    if (!this.isRunning) return;

    if (this.systemHandle) clearInterval(this.systemHandle);
    if (this.turnHandle) clearInterval(this.turnHandle);
    this.systemHandle = undefined;
    this.turnHandle = undefined;
    this.isRunning = false;

    logger.info("Scheduler stopped", LogCategory.SIMULATION);
  }

  public get running(): boolean {
    return this.isRunning;
  }

  /**
   * Speeds up or slows down turns. Takes effect immediately when running.
   */
  public setTimeScale(scale: number): void {
    this.timeScale = scale;
    if (this.isRunning) {
      if (this.turnHandle) clearInterval(this.turnHandle);
      this.scheduleTurns();
    }
  }

  public getTimeScale(): number {
    return this.timeScale;
  }

  /**
   * Runs one tick of the given rate with hooks and bookkeeping.
   */
  public tick(rate: TickRate): void {
    const startTime = performance.now();

    try {
      this.hooks.preTick?.();
      this.handlers[rate]();
      this.hooks.postTick?.();
    } catch (error) {
      logger.error(`Error in ${rate} tick`, LogCategory.SIMULATION, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const elapsed = performance.now() - startTime;
    const stats = this.stats[rate];
    stats.count++;
    stats.totalMs += elapsed;
    stats.avgMs = stats.totalMs / stats.count;
  }

  public getStats(): SchedulerStatsSnapshot {
    return {
      system: { ...this.stats[TickRate.SYSTEM] },
      turn: { ...this.stats[TickRate.TURN] },
      isRunning: this.isRunning,
      timeScale: this.timeScale,
    };
  }

  private turnInterval(): number {
    return Math.max(1, Math.round(this.tickRates[TickRate.TURN] / this.timeScale));
  }

  private scheduleTurns(): void {
    this.turnHandle = setInterval(() => this.tick(TickRate.TURN), this.turnInterval());
  }
}
