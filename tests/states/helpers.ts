import type { TestSimulation } from "../setup";

/** Arrives at the first location of the loaded trail. */
export function arriveAtStart(sim: TestSimulation): void {
  sim.trail.onTick(false);
}

/**
 * Leaves the current location and drives until the next arrival. Assumes
 * the vehicle mileage covers a whole leg in one turn.
 */
export function travelOneLeg(sim: TestSimulation): void {
  sim.time.advanceTurn();
  sim.trail.departCurrentLocation();
  sim.trail.beginNextLeg();
  sim.vehicle.drive();
  sim.trail.onTick(false);
}
