import { describe, it, expect } from "vitest";
import { createForkTrail, createTestSimulation, type TestSimulation } from "../setup";
import { arriveAtStart, travelOneLeg } from "./helpers";
import { LocationFork } from "../../src/domain/simulation/states/LocationFork";
import { LocationDepart } from "../../src/domain/simulation/states/LocationDepart";
import { LookAtMap } from "../../src/domain/simulation/states/LookAtMap";
import { createForm } from "../../src/domain/simulation/states/StateFactory";
import { Transitions } from "../../src/domain/simulation/states/transitions";
import { FormKind } from "../../src/shared/constants/ModeEnums";
import { LocationStatus } from "../../src/shared/constants/TrailEnums";

function arriveAtFork(): TestSimulation {
  const sim = createTestSimulation({
    trail: createForkTrail(),
    legDistance: 5,
    baseMileage: 5,
  });
  arriveAtStart(sim);
  travelOneLeg(sim);
  return sim;
}

describe("LocationFork", () => {
  it("debe numerar las alternativas y ofrecer el mapa al final", () => {
    const sim = arriveAtFork();

    const fork = new LocationFork(sim.context);

    expect(fork.render()).toBe(
      "\nThe trail divides here. You may:\n\n" +
        "  1. head for North Camp\n" +
        "  2. head for South Camp\n" +
        "  3. see the map",
    );
  });

  it("debe mostrar solo el encabezado cuando no hay alternativas", () => {
    const sim = createTestSimulation();
    arriveAtStart(sim);

    const fork = new LocationFork(sim.context);

    expect(fork.render()).toBe("\nThe trail divides here. You may:\n\n");
    expect(fork.onInput("1")).toEqual(Transitions.setForm(FormKind.LOOK_AT_MAP));
  });

  it("debe mostrar lo mismo en cada render", () => {
    const sim = arriveAtFork();
    const fork = new LocationFork(sim.context);

    expect(fork.render()).toBe(fork.render());
  });

  it("debe ignorar un número que no cabe en 32 bits", () => {
    const sim = arriveAtFork();
    const fork = new LocationFork(sim.context);

    expect(fork.onInput("99999999999")).toEqual(Transitions.none());
    expect(sim.trail.locations).toHaveLength(3);
  });

  it("debe insertar la alternativa elegida y pasar a la partida", () => {
    const sim = arriveAtFork();
    const fork = new LocationFork(sim.context);

    const transition = fork.onInput("1");

    expect(transition).toEqual(Transitions.setForm(FormKind.LOCATION_DEPART));
    expect(sim.trail.locations.map((l) => l.name)).toEqual([
      "Start",
      "Split Rock",
      "North Camp",
      "Finish",
    ]);
    expect(sim.trail.nextLocation?.name).toBe("North Camp");
  });

  it("debe abrir el mapa con la última opción o una fuera de rango", () => {
    const sim = arriveAtFork();
    const fork = new LocationFork(sim.context);

    expect(fork.onInput("3")).toEqual(Transitions.setForm(FormKind.LOOK_AT_MAP));
    expect(fork.onInput("9")).toEqual(Transitions.setForm(FormKind.LOOK_AT_MAP));
    expect(sim.trail.locations).toHaveLength(3);
  });

  it("debe ignorar entradas que no son una opción", () => {
    const sim = arriveAtFork();
    const fork = new LocationFork(sim.context);

    expect(fork.onInput("abc")).toEqual(Transitions.none());
    expect(fork.onInput("0")).toEqual(Transitions.none());
    expect(fork.onInput("-2")).toEqual(Transitions.none());
    expect(fork.onInput("")).toEqual(Transitions.none());
    expect(sim.trail.locations).toHaveLength(3);
  });
});

describe("LocationDepart", () => {
  it("debe anunciar el destino elegido y partir", () => {
    const sim = arriveAtFork();
    new LocationFork(sim.context).onInput("2");
    const depart = new LocationDepart(sim.context);

    expect(depart.render()).toBe(
      "\nYou leave Split Rock and head for South Camp.\nIt is 5 miles away.\n\n",
    );
    expect(depart.onInput("")).toEqual(Transitions.close());
    expect(sim.trail.currentLocation?.status).toBe(LocationStatus.DEPARTED);
  });

  it("debe mostrar lo mismo en cada render", () => {
    const sim = arriveAtFork();
    new LocationFork(sim.context).onInput("1");
    const depart = new LocationDepart(sim.context);

    expect(depart.render()).toBe(depart.render());
  });
});

describe("LookAtMap", () => {
  it("debe marcar la posición actual y los lugares visitados", () => {
    const sim = arriveAtFork();

    const map = new LookAtMap(sim.context);

    expect(map.render()).toBe(
      "\nFork Trail\n\n" +
        "  [x] Start\n" +
        "> [x] Split Rock\n" +
        "  [ ] Finish\n" +
        "\n5 of 100 miles traveled\n",
    );
  });

  it("debe mostrar lo mismo en cada render", () => {
    const sim = arriveAtFork();
    const map = new LookAtMap(sim.context);

    expect(map.render()).toBe(map.render());
  });

  it("debe volver a la bifurcación si sigue sin resolver", () => {
    const sim = arriveAtFork();

    expect(new LookAtMap(sim.context).onInput("")).toEqual(
      Transitions.setForm(FormKind.LOCATION_FORK),
    );
  });

  it("debe cerrarse fuera de una bifurcación", () => {
    const sim = createTestSimulation();
    arriveAtStart(sim);

    expect(new LookAtMap(sim.context).onInput("")).toEqual(Transitions.close());
  });
});

describe("createForm", () => {
  it("debe construir el formulario de cada tipo", () => {
    const sim = createTestSimulation();

    for (const kind of Object.values(FormKind)) {
      expect(createForm(kind, sim.context).kind).toBe(kind);
    }
  });
});
