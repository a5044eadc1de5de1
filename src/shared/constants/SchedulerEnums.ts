/**
 * Scheduler type enumerations for the simulation loop.
 *
 * @module shared/constants/SchedulerEnums
 */

/**
 * Enumeration of tick rates.
 */
export enum TickRate {
  /** Housekeeping tick: drains input and flushes events, never advances the game. */
  SYSTEM = "SYSTEM",
  /** Fixed tick: one turn of the game, one day on the trail. */
  TURN = "TURN",
}
