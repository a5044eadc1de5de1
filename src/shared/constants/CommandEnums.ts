/**
 * Command type enumerations for the simulation system.
 *
 * Defines all command types used in SimulationCommand and related payloads.
 *
 * @module shared/constants/CommandEnums
 */

/**
 * Enumeration of main simulation command types.
 */
export enum SimulationCommandType {
  PLAYER_INPUT = "PLAYER_INPUT",
  SET_PACE = "SET_PACE",
  SET_TIME_SCALE = "SET_TIME_SCALE",
  RESET = "RESET",
  PING = "PING",
}
