import { SimulationCommandType } from "../../constants/CommandEnums";
import { TravelPace } from "../../constants/VehicleEnums";

/**
 * Commands accepted by the simulation runner. They are queued and applied
 * at the start of the next tick.
 */
export type SimulationCommand =
  | { type: SimulationCommandType.PLAYER_INPUT; input: string }
  | { type: SimulationCommandType.SET_PACE; pace: TravelPace }
  | { type: SimulationCommandType.SET_TIME_SCALE; multiplier: number }
  | { type: SimulationCommandType.RESET }
  | { type: SimulationCommandType.PING };

export interface SimulationConfig {
  /** Commands kept before the oldest is dropped */
  maxCommandQueue: number;
  /** System tick period in milliseconds */
  tickIntervalMs: number;
  /** Turn period in milliseconds at time scale 1 */
  turnIntervalMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates an untrusted payload (HTTP body, WebSocket message) and returns
 * the command it describes, or undefined when it is not a valid command.
 */
export function parseSimulationCommand(
  value: unknown,
): SimulationCommand | undefined {
  if (!isRecord(value)) return undefined;

  switch (value.type) {
    case SimulationCommandType.PLAYER_INPUT:
      return typeof value.input === "string"
        ? { type: SimulationCommandType.PLAYER_INPUT, input: value.input }
        : undefined;
    case SimulationCommandType.SET_PACE: {
      const pace = Object.values(TravelPace).find((p) => p === value.pace);
      return pace ? { type: SimulationCommandType.SET_PACE, pace } : undefined;
    }
    case SimulationCommandType.SET_TIME_SCALE:
      return typeof value.multiplier === "number" &&
        Number.isFinite(value.multiplier)
        ? {
            type: SimulationCommandType.SET_TIME_SCALE,
            multiplier: value.multiplier,
          }
        : undefined;
    case SimulationCommandType.RESET:
      return { type: SimulationCommandType.RESET };
    case SimulationCommandType.PING:
      return { type: SimulationCommandType.PING };
    default:
      return undefined;
  }
}
