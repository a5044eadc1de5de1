import { BatchedEventEmitter } from "./BatchedEventEmitter";
import {
  GameEventType,
  ALL_GAME_EVENT_TYPES,
} from "../../../shared/constants/EventEnums";

/**
 * Global event emitter for simulation events.
 * Uses batched event processing; listeners run when the runner flushes.
 *
 * @see BatchedEventEmitter for batching behavior
 */
export const simulationEvents = new BatchedEventEmitter();

export { GameEventType, ALL_GAME_EVENT_TYPES };
