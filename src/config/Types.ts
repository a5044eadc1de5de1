/**
 * Dependency injection type symbols.
 *
 * Used by Inversify container to identify and resolve dependencies.
 * Each symbol represents a unique service, module or configuration value.
 *
 * @module config
 */
export const TYPES = {
  SimulationRunner: Symbol.for("SimulationRunner"),
  SimulationConfig: Symbol.for("SimulationConfig"),

  TrailModule: Symbol.for("TrailModule"),
  TrailConfig: Symbol.for("TrailConfig"),
  DistancePolicy: Symbol.for("DistancePolicy"),

  Vehicle: Symbol.for("Vehicle"),
  VehicleConfig: Symbol.for("VehicleConfig"),

  TimeModule: Symbol.for("TimeModule"),
  TimeConfig: Symbol.for("TimeConfig"),

  RandomEventModule: Symbol.for("RandomEventModule"),
  RandomEvents: Symbol.for("RandomEvents"),
  EventHistory: Symbol.for("EventHistory"),

  ModeManager: Symbol.for("ModeManager"),
  ModeRequester: Symbol.for("ModeRequester"),
};
