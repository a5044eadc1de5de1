/**
 * Simulation event enumerations.
 *
 * @module shared/constants/EventEnums
 */

/**
 * Events emitted on the shared simulation event bus.
 */
export enum GameEventType {
  TURN_ADVANCED = "turn_advanced",
  TRAIL_ARRIVED = "trail_arrived",
  TRAIL_COMPLETED = "trail_completed",
  LOCATION_DEPARTED = "location_departed",
  LOCATION_INSERTED = "location_inserted",
  MODE_CHANGED = "mode_changed",
  RANDOM_EVENT_FIRED = "random_event_fired",
  VEHICLE_MOVING = "vehicle_moving",
}

export const ALL_GAME_EVENT_TYPES: readonly GameEventType[] =
  Object.values(GameEventType);

/**
 * Category of a random travel event, recorded in the event history.
 */
export enum EventCategory {
  VEHICLE = "vehicle",
  PERSON = "person",
  WILD = "wild",
  WEATHER = "weather",
}
