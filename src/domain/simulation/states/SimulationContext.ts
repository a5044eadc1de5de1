import type { TrailModule } from "../systems/trail/TrailModule";
import type { Vehicle } from "../systems/vehicle/Vehicle";
import type { TimeModule } from "../systems/core/TimeModule";
import type { EventHistory } from "../systems/events/EventHistory";

/**
 * Everything a mode or form may read or change. Passed in explicitly so
 * states can be built against any simulation, including test doubles.
 */
export interface SimulationContext {
  trail: TrailModule;
  vehicle: Vehicle;
  time: TimeModule;
  history: EventHistory;
}
