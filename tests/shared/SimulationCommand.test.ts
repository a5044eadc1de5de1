import { describe, it, expect } from "vitest";
import { parseSimulationCommand } from "../../src/shared/types/commands/SimulationCommand";
import { SimulationCommandType } from "../../src/shared/constants/CommandEnums";
import { TravelPace } from "../../src/shared/constants/VehicleEnums";

describe("parseSimulationCommand", () => {
  it("debe aceptar cada tipo de comando válido", () => {
    expect(parseSimulationCommand({ type: "PLAYER_INPUT", input: "1" })).toEqual({
      type: SimulationCommandType.PLAYER_INPUT,
      input: "1",
    });
    expect(parseSimulationCommand({ type: "SET_PACE", pace: "grueling" })).toEqual({
      type: SimulationCommandType.SET_PACE,
      pace: TravelPace.GRUELING,
    });
    expect(parseSimulationCommand({ type: "SET_TIME_SCALE", multiplier: 2 })).toEqual({
      type: SimulationCommandType.SET_TIME_SCALE,
      multiplier: 2,
    });
    expect(parseSimulationCommand({ type: "RESET" })).toEqual({
      type: SimulationCommandType.RESET,
    });
    expect(parseSimulationCommand({ type: "PING", extra: true })).toEqual({
      type: SimulationCommandType.PING,
    });
  });

  it("debe rechazar valores que no son objetos", () => {
    expect(parseSimulationCommand(null)).toBeUndefined();
    expect(parseSimulationCommand("PING")).toBeUndefined();
    expect(parseSimulationCommand([{ type: "PING" }])).toBeUndefined();
  });

  it("debe rechazar tipos desconocidos y campos inválidos", () => {
    expect(parseSimulationCommand({ type: "FLY" })).toBeUndefined();
    expect(parseSimulationCommand({ type: "PLAYER_INPUT", input: 1 })).toBeUndefined();
    expect(parseSimulationCommand({ type: "SET_PACE", pace: "sprint" })).toBeUndefined();
    expect(
      parseSimulationCommand({ type: "SET_TIME_SCALE", multiplier: Number.POSITIVE_INFINITY }),
    ).toBeUndefined();
    expect(parseSimulationCommand({ type: "SET_TIME_SCALE", multiplier: "2" })).toBeUndefined();
  });
});
