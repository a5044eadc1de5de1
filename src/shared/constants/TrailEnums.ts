/**
 * Trail enumerations for the simulation system.
 *
 * @module shared/constants/TrailEnums
 */

/**
 * Visitation status of a location. Moves forward only:
 * UNVISITED -> ARRIVED -> DEPARTED.
 */
export enum LocationStatus {
  UNVISITED = "unvisited",
  ARRIVED = "arrived",
  DEPARTED = "departed",
}

/**
 * Kind of point of interest, used by the map and the trail data file.
 */
export enum LocationKind {
  LANDMARK = "landmark",
  SETTLEMENT = "settlement",
  RIVER_CROSSING = "river_crossing",
  FORK_IN_ROAD = "fork_in_road",
}
