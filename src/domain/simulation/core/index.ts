import { SimulationRunner } from "./SimulationRunner";
import { container } from "../../../config/container";
import { TYPES } from "../../../config/Types";

export const simulationRunner = container.get<SimulationRunner>(
  TYPES.SimulationRunner,
);

export type {
  SimulationCommand,
  SimulationConfig,
} from "../../../shared/types/commands/SimulationCommand";
export type { GameSnapshot } from "../../../shared/types/game-types";
