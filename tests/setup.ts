import { vi } from "vitest";
import { Location } from "../src/domain/simulation/systems/trail/Location";
import { Trail } from "../src/domain/simulation/systems/trail/Trail";
import { TrailModule } from "../src/domain/simulation/systems/trail/TrailModule";
import {
  FixedDistancePolicy,
  type DistancePolicy,
} from "../src/domain/simulation/systems/trail/DistancePolicy";
import { Vehicle } from "../src/domain/simulation/systems/vehicle/Vehicle";
import type { Supplies } from "../src/domain/simulation/systems/vehicle/Inventory";
import { TimeModule } from "../src/domain/simulation/systems/core/TimeModule";
import { EventHistory } from "../src/domain/simulation/systems/events/EventHistory";
import { RandomEventModule } from "../src/domain/simulation/systems/events/RandomEventModule";
import type { RandomEvent } from "../src/domain/simulation/systems/events/RandomEvent";
import { ModeManager } from "../src/domain/simulation/modes/ModeManager";
import type { ModeRequester } from "../src/domain/simulation/modes/ModeRequester";
import type { SimulationContext } from "../src/domain/simulation/states/SimulationContext";
import { SimulationRunner } from "../src/domain/simulation/core/SimulationRunner";
import { LocationKind } from "../src/shared/constants/TrailEnums";
import type { GameMode } from "../src/shared/constants/ModeEnums";

export const TEST_START_DATE = "1848-03-01";

/**
 * Trail of plain landmarks named after the given list.
 */
export function createTestTrail(
  names: string[] = ["Alpha", "Bravo", "Charlie"],
  trailLength = 100,
): Trail {
  return new Trail(
    "test",
    "Test Trail",
    names.map((name) => new Location(name)),
    trailLength,
  );
}

/**
 * Three-stop trail whose middle stop forks toward two alternate locations.
 */
export function createForkTrail(): Trail {
  const fork = new Location("Split Rock", {
    kind: LocationKind.FORK_IN_ROAD,
    skipChoices: [new Location("North Camp"), new Location("South Camp")],
  });
  return new Trail(
    "fork",
    "Fork Trail",
    [new Location("Start"), fork, new Location("Finish")],
    100,
  );
}

export class FakeModeRequester implements ModeRequester {
  public readonly requested: GameMode[] = [];
  public readonly addMode = vi.fn((mode: GameMode): void => {
    this.requested.push(mode);
  });
}

export interface TestSimulationOptions {
  trail?: Trail;
  legDistance?: number;
  policy?: DistancePolicy;
  baseMileage?: number;
  supplies?: Supplies;
  events?: RandomEvent[];
  /** Replaces the real mode manager as the target of trail mode requests. */
  modeRequester?: ModeRequester;
}

export interface TestSimulation extends SimulationContext {
  modes: ModeManager;
  randomEvents: RandomEventModule;
  context: SimulationContext;
}

/**
 * Wires the simulation modules by hand, the same way the container does.
 */
export function createTestSimulation(
  options: TestSimulationOptions = {},
): TestSimulation {
  const vehicle = new Vehicle({
    baseMileage: options.baseMileage ?? 1,
    supplies: options.supplies,
  });
  const time = new TimeModule({ startDate: TEST_START_DATE });
  const history = new EventHistory();
  const modes = new ModeManager();
  const trail = new TrailModule(
    { trailId: "oregon" },
    options.policy ?? new FixedDistancePolicy(options.legDistance ?? 1),
    vehicle,
    time,
    options.modeRequester ?? modes,
  );
  trail.load(options.trail ?? createTestTrail());

  const context: SimulationContext = { trail, vehicle, time, history };
  modes.setContext(context);

  const randomEvents = new RandomEventModule(
    options.events ?? [],
    vehicle,
    time,
    history,
  );

  return { ...context, modes, randomEvents, context };
}

export function createTestRunner(
  options: TestSimulationOptions & { maxCommandQueue?: number } = {},
): { runner: SimulationRunner; sim: TestSimulation } {
  const sim = createTestSimulation(options);
  const runner = new SimulationRunner(
    {
      maxCommandQueue: options.maxCommandQueue ?? 200,
      tickIntervalMs: 100,
      turnIntervalMs: 1000,
    },
    sim.trail,
    sim.vehicle,
    sim.time,
    sim.randomEvents,
    sim.history,
    sim.modes,
  );
  return { runner, sim };
}
