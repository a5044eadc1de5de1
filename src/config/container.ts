import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Every module is a singleton: one container runs one game.
 *
 * Registered:
 * - Core: SimulationRunner, ModeManager
 * - Modules: TrailModule, Vehicle, TimeModule, RandomEventModule, EventHistory
 * - Configuration values and the leg distance policy
 *
 * @module config
 */
import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { ModeManager } from "../domain/simulation/modes/ModeManager";
import type { ModeRequester } from "../domain/simulation/modes/ModeRequester";
import {
  TrailModule,
  type TrailConfig,
} from "../domain/simulation/systems/trail/TrailModule";
import {
  FixedDistancePolicy,
  type DistancePolicy,
} from "../domain/simulation/systems/trail/DistancePolicy";
import {
  Vehicle,
  type VehicleConfig,
} from "../domain/simulation/systems/vehicle/Vehicle";
import {
  TimeModule,
  type TimeConfig,
} from "../domain/simulation/systems/core/TimeModule";
import { RandomEventModule } from "../domain/simulation/systems/events/RandomEventModule";
import { EventHistory } from "../domain/simulation/systems/events/EventHistory";
import type { RandomEvent } from "../domain/simulation/systems/events/RandomEvent";
import { BUILTIN_EVENTS } from "../domain/simulation/systems/events/builtinEvents";
import type { SimulationConfig } from "../shared/types/commands/SimulationCommand";
import { RandomUtils } from "../shared/utils/RandomUtils";

RandomUtils.seed(CONFIG.RANDOM_SEED);

export const container = new Container();

container.bind<SimulationConfig>(TYPES.SimulationConfig).toConstantValue({
  maxCommandQueue: CONFIG.MAX_COMMAND_QUEUE,
  tickIntervalMs: CONFIG.TICK_INTERVAL_MS,
  turnIntervalMs: CONFIG.TURN_INTERVAL_MS,
});
container
  .bind<TrailConfig>(TYPES.TrailConfig)
  .toConstantValue({ trailId: CONFIG.TRAIL_ID });
container
  .bind<VehicleConfig>(TYPES.VehicleConfig)
  .toConstantValue({ baseMileage: CONFIG.VEHICLE_BASE_MILEAGE });
container
  .bind<TimeConfig>(TYPES.TimeConfig)
  .toConstantValue({ startDate: CONFIG.START_DATE });
container
  .bind<readonly RandomEvent[]>(TYPES.RandomEvents)
  .toConstantValue(BUILTIN_EVENTS);
container
  .bind<DistancePolicy>(TYPES.DistancePolicy)
  .toConstantValue(new FixedDistancePolicy(CONFIG.TRAIL_FIXED_LEG_DISTANCE));

container
  .bind<SimulationRunner>(TYPES.SimulationRunner)
  .to(SimulationRunner)
  .inSingletonScope();
container
  .bind<ModeManager>(TYPES.ModeManager)
  .to(ModeManager)
  .inSingletonScope();
container
  .bind<ModeRequester>(TYPES.ModeRequester)
  .toService(TYPES.ModeManager);
container
  .bind<TrailModule>(TYPES.TrailModule)
  .to(TrailModule)
  .inSingletonScope();
container.bind<Vehicle>(TYPES.Vehicle).to(Vehicle).inSingletonScope();
container
  .bind<TimeModule>(TYPES.TimeModule)
  .to(TimeModule)
  .inSingletonScope();
container
  .bind<RandomEventModule>(TYPES.RandomEventModule)
  .to(RandomEventModule)
  .inSingletonScope();
container
  .bind<EventHistory>(TYPES.EventHistory)
  .to(EventHistory)
  .inSingletonScope();
