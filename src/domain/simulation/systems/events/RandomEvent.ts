import type { EventCategory } from "../../../../shared/constants/EventEnums";
import type { Vehicle } from "../vehicle/Vehicle";

/**
 * Travel event that may happen on any turn spent between two locations.
 */
export interface RandomEvent {
  readonly name: string;
  readonly category: EventCategory;
  /** Probability (0-1) of firing on a single roll. */
  readonly rollChance: number;
  /** Applies the event and returns a line describing what happened. */
  execute(vehicle: Vehicle): string;
}
