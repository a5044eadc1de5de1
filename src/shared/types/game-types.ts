/**
 * Snapshot types sent to clients over HTTP and WebSocket.
 *
 * @module shared/types/game-types
 */

import type { LocationKind, LocationStatus } from "../constants/TrailEnums";
import type { FormKind, GameMode } from "../constants/ModeEnums";
import type { ItemKind, TravelPace } from "../constants/VehicleEnums";
import type { EventCategory } from "../constants/EventEnums";

export interface LocationSnapshot {
  name: string;
  kind: LocationKind;
  status: LocationStatus;
}

export interface TrailSnapshot {
  trailId: string;
  trailName: string;
  trailLength: number;
  locationIndex: number;
  distanceToNextLocation: number;
  /** Length of the leg that starts at the current location. */
  legDistance: number;
  distanceTraveled: number;
  complete: boolean;
  locations: LocationSnapshot[];
}

export interface VehicleSnapshot {
  parked: boolean;
  pace: TravelPace;
  mileage: number;
  inventory: Partial<Record<ItemKind, number>>;
}

export interface TimeSnapshot {
  totalTurns: number;
  date: string;
}

export interface ModeSnapshot {
  activeMode?: GameMode;
  activeForm?: FormKind;
  stack: GameMode[];
}

export interface EventHistorySnapshot {
  eventName: string;
  eventType: EventCategory;
  date: string;
  outcome: string;
}

/**
 * Full view of one running game.
 */
export interface GameSnapshot {
  tick: number;
  trail: TrailSnapshot;
  vehicle: VehicleSnapshot;
  time: TimeSnapshot;
  modes: ModeSnapshot;
  events: EventHistorySnapshot[];
  screen: string;
}
