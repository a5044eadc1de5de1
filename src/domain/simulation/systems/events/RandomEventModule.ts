import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import { Vehicle } from "../vehicle/Vehicle";
import { TimeModule } from "../core/TimeModule";
import { EventHistory, EventHistoryItem } from "./EventHistory";
import type { RandomEvent } from "./RandomEvent";
import { RandomUtils } from "../../../../shared/utils/RandomUtils";
import { simulationEvents, GameEventType } from "../../core/events";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import type { SimulationModule } from "../SimulationModule";

/**
 * Rolls the registered travel events once per turn. At most one event fires
 * per turn; the first successful roll wins.
 */
@injectable()
export class RandomEventModule implements SimulationModule {
  private readonly rollCounts = new Map<string, number>();

  constructor(
    @inject(TYPES.RandomEvents) private readonly events: readonly RandomEvent[],
    @inject(TYPES.Vehicle) private readonly vehicle: Vehicle,
    @inject(TYPES.TimeModule) private readonly time: TimeModule,
    @inject(TYPES.EventHistory) private readonly history: EventHistory,
  ) {}

  public onTick(systemTick: boolean): void {
    if (systemTick) return;

    for (const event of this.events) {
      if (RandomUtils.chance(event.rollChance)) {
        this.fire(event);
        return;
      }
    }
  }

  /**
   * Applies an event unconditionally and records it in the history.
   */
  public fire(event: RandomEvent): EventHistoryItem {
    const outcome = event.execute(this.vehicle);
    this.rollCounts.set(event.name, this.getRollCount(event.name) + 1);

    const item = new EventHistoryItem(
      event.name,
      event.category,
      this.time.date,
      outcome,
    );
    this.history.record(item);

    logger.info(`${event.name}: ${outcome}`, LogCategory.EVENTS);
    simulationEvents.queueEvent(GameEventType.RANDOM_EVENT_FIRED, {
      name: event.name,
      category: event.category,
      outcome,
    });
    return item;
  }

  /** Number of times the named event has fired this game. */
  public getRollCount(name: string): number {
    return this.rollCounts.get(name) ?? 0;
  }

  public destroy(): void {
    this.rollCounts.clear();
  }
}
