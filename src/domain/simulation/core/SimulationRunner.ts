import { EventEmitter } from "node:events";
import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import { TrailModule } from "../systems/trail/TrailModule";
import { Vehicle } from "../systems/vehicle/Vehicle";
import { TimeModule, formatGameDate } from "../systems/core/TimeModule";
import { RandomEventModule } from "../systems/events/RandomEventModule";
import { EventHistory } from "../systems/events/EventHistory";
import { ModeManager } from "../modes/ModeManager";
import type { SimulationContext } from "../states/SimulationContext";
import type { SimulationModule } from "../systems/SimulationModule";
import { GameMode } from "../../../shared/constants/ModeEnums";
import { LocationStatus } from "../../../shared/constants/TrailEnums";
import { TickRate } from "../../../shared/constants/SchedulerEnums";
import { simulationEvents, GameEventType } from "./events";
import { TickScheduler, type SchedulerStatsSnapshot } from "./TickScheduler";
import { CommandProcessor } from "./runner/CommandProcessor";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import type {
  SimulationCommand,
  SimulationConfig,
} from "../../../shared/types/commands/SimulationCommand";
import type { GameSnapshot } from "../../../shared/types/game-types";

interface RunnerEvents {
  tick: [GameSnapshot];
  commandDropped: [SimulationCommand];
}

/**
 * Drives one game: queues player commands, runs the system and turn ticks
 * and publishes a snapshot whenever something visible changed.
 *
 * A turn only advances the trail while the travel loop is in control, that
 * is when no form is open on the travel mode and the trail is not finished.
 */
@injectable()
export class SimulationRunner {
  private readonly emitter = new EventEmitter();
  private readonly commands: SimulationCommand[] = [];
  private readonly maxCommandQueue: number;
  private readonly scheduler: TickScheduler;
  private readonly commandProcessor: CommandProcessor;
  private readonly context: SimulationContext;
  private readonly modules: SimulationModule[];
  private tickCounter = 0;
  private dirty = true;

  constructor(
    @inject(TYPES.SimulationConfig) config: SimulationConfig,
    @inject(TYPES.TrailModule) public readonly trail: TrailModule,
    @inject(TYPES.Vehicle) public readonly vehicle: Vehicle,
    @inject(TYPES.TimeModule) public readonly time: TimeModule,
    @inject(TYPES.RandomEventModule)
    public readonly randomEvents: RandomEventModule,
    @inject(TYPES.EventHistory) public readonly history: EventHistory,
    @inject(TYPES.ModeManager) public readonly modes: ModeManager,
  ) {
    this.maxCommandQueue = config.maxCommandQueue;
    this.context = { trail, vehicle, time, history };
    this.modes.setContext(this.context);
    this.modules = [trail, randomEvents, time];

    this.commandProcessor = new CommandProcessor(this);
    this.scheduler = new TickScheduler(
      {
        [TickRate.SYSTEM]: config.tickIntervalMs,
        [TickRate.TURN]: config.turnIntervalMs,
      },
      () => this.runSystemTick(),
      () => this.runTurn(),
    );
    this.scheduler.setHooks({
      preTick: () => {
        if (this.commands.length > 0) {
          this.commandProcessor.process(this.commands);
          this.dirty = true;
        }
      },
      postTick: () => {
        simulationEvents.flushEvents();
        this.tickCounter += 1;
        if (this.dirty) {
          this.dirty = false;
          this.emit("tick", this.getSnapshot());
        }
      },
    });
  }

  public on<K extends keyof RunnerEvents>(
    event: K,
    listener: (...args: RunnerEvents[K]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  public off<K extends keyof RunnerEvents>(
    event: K,
    listener: (...args: RunnerEvents[K]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  private emit<K extends keyof RunnerEvents>(
    event: K,
    ...args: RunnerEvents[K]
  ): void {
    this.emitter.emit(event, ...args);
  }

  public start(): void {
    this.scheduler.start();
  }

  public stop(): void {
    this.scheduler.stop();
  }

  /**
   * Runs a single tick of the given rate immediately, hooks included.
   */
  public tick(rate: TickRate = TickRate.TURN): void {
    this.scheduler.tick(rate);
  }

  public get timeScale(): number {
    return this.scheduler.getTimeScale();
  }

  public setTimeScale(scale: number): void {
    this.scheduler.setTimeScale(scale);
  }

  public getTickCounter(): number {
    return this.tickCounter;
  }

  public getSchedulerStats(): SchedulerStatsSnapshot {
    return this.scheduler.getStats();
  }

  public isTravelLoopActive(): boolean {
    if (this.trail.isComplete) return false;
    const mode = this.modes.activeMode;
    return (
      mode === undefined ||
      (mode === GameMode.TRAVEL && !this.modes.hasAttachedState)
    );
  }

  private runSystemTick(): void {
    for (const module of this.modules) {
      module.onTick(true);
    }
  }

  /**
   * Advances the game by one turn. Returns false when the travel loop is
   * not in control or the wagon is waiting at a location.
   */
  public runTurn(): boolean {
    if (!this.isTravelLoopActive()) return false;

    if (this.vehicle.parked) {
      const current = this.trail.currentLocation;
      if (current?.status !== LocationStatus.DEPARTED) return false;

      this.trail.beginNextLeg();
      this.vehicle.drive();
      simulationEvents.queueEvent(GameEventType.VEHICLE_MOVING, {
        from: current.name,
        distance: this.trail.distanceToNextLocation,
      });
    }

    this.trail.onTick(false);
    // Events only happen between locations.
    if (!this.vehicle.parked) {
      this.randomEvents.onTick(false);
    }
    this.time.onTick(false);

    this.dirty = true;
    return true;
  }

  /**
   * Queues a command for the next tick. When the queue is full the oldest
   * command is dropped.
   */
  public enqueueCommand(command: SimulationCommand): boolean {
    if (this.commands.length >= this.maxCommandQueue) {
      const dropped = this.commands.shift();
      logger.warn(
        `Command queue full (${this.maxCommandQueue}), dropping oldest command: ${dropped?.type}`,
        LogCategory.SIMULATION,
      );
      if (dropped) {
        this.emit("commandDropped", dropped);
      }
    }
    this.commands.push(command);
    return true;
  }

  public getCommandQueueSize(): number {
    return this.commands.length;
  }

  /**
   * Starts a new game on the configured trail.
   */
  public reset(): void {
    this.modes.destroy();
    this.time.destroy();
    this.randomEvents.destroy();
    this.history.clear();
    this.vehicle.reset();
    this.trail.reset();
    simulationEvents.clearQueue();
    this.dirty = true;
    logger.info("Simulation reset", LogCategory.SIMULATION);
  }

  public getScreen(): string {
    return this.modes.render();
  }

  public getSnapshot(): GameSnapshot {
    return {
      tick: this.tickCounter,
      trail: this.trail.getSnapshot(),
      vehicle: this.vehicle.getSnapshot(),
      time: {
        totalTurns: this.time.totalTurns,
        date: this.time.formattedDate,
      },
      modes: this.modes.getSnapshot(),
      events: this.history.all().map((item) => ({
        eventName: item.eventName,
        eventType: item.eventType,
        date: formatGameDate(item.timestamp),
        outcome: item.outcome,
      })),
      screen: this.getScreen(),
    };
  }

  public destroy(): void {
    this.stop();
    for (const module of this.modules) {
      module.destroy();
    }
    this.modes.destroy();
    this.history.clear();
    this.commands.length = 0;
    this.emitter.removeAllListeners();
  }
}
