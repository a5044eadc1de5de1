import { injectable } from "inversify";
import type { EventCategory } from "../../../../shared/constants/EventEnums";
import type { GameDate } from "../core/TimeModule";

/**
 * An event that has occurred in the simulation's past.
 */
export class EventHistoryItem {
  constructor(
    public readonly eventName: string,
    public readonly eventType: EventCategory,
    /** When the event happened. */
    public readonly timestamp: GameDate,
    public readonly outcome: string,
  ) {}
}

@injectable()
export class EventHistory {
  private readonly items: EventHistoryItem[] = [];

  public record(item: EventHistoryItem): void {
    this.items.push(item);
  }

  public get latest(): EventHistoryItem | undefined {
    return this.items[this.items.length - 1];
  }

  public all(): readonly EventHistoryItem[] {
    return this.items;
  }

  public clear(): void {
    this.items.length = 0;
  }
}
