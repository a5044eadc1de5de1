import { describe, it, expect } from "vitest";
import { Trail } from "../../src/domain/simulation/systems/trail/Trail";
import { Location } from "../../src/domain/simulation/systems/trail/Location";
import { TrailRegistry } from "../../src/domain/simulation/systems/trail/TrailRegistry";
import { FixedDistancePolicy } from "../../src/domain/simulation/systems/trail/DistancePolicy";
import { LocationKind, LocationStatus } from "../../src/shared/constants/TrailEnums";
import { createTestTrail } from "../setup";

describe("Trail", () => {
  it("debe rechazar un sendero sin lugares", () => {
    expect(() => new Trail("empty", "Empty", [], 10)).toThrow(
      'Trail "empty" must contain at least one location',
    );
  });

  it("debe rechazar una longitud que no alcanza para un tramo por lugar", () => {
    expect(() => createTestTrail(["A", "B", "C"], 2)).toThrow(
      'Trail "test" length 2 cannot fit 3 legs of at least one mile',
    );
  });

  it("debe contar un tramo extra por cada bifurcación", () => {
    const fork = new Location("Split", {
      kind: LocationKind.FORK_IN_ROAD,
      skipChoices: [new Location("Left"), new Location("Right")],
    });

    expect(fork.detourLegs).toBe(1);
    expect(() => new Trail("f", "F", [new Location("A"), fork, new Location("B")], 3)).toThrow(
      'Trail "f" length 3 cannot fit 4 legs of at least one mile',
    );
    expect(new Trail("f", "F", [new Location("A"), fork, new Location("B")], 4).trailLength).toBe(4);
  });

  it("debe insertar después del índice dado", () => {
    const trail = createTestTrail(["A", "B"], 10);

    trail.insertAfter(0, new Location("X"));

    expect(trail.locations.map((l) => l.name)).toEqual(["A", "X", "B"]);
  });

  it("no debe compartir el arreglo recibido", () => {
    const locations = [new Location("A")];
    const trail = new Trail("t", "T", locations, 5);

    locations.push(new Location("B"));

    expect(trail.locations).toHaveLength(1);
  });
});

describe("TrailRegistry", () => {
  it("debe listar los senderos incluidos", () => {
    expect(TrailRegistry.ids()).toContain("oregon");
  });

  it("debe construir el sendero de Oregón desde los datos", () => {
    const trail = TrailRegistry.create("oregon");

    expect(trail.name).toBe("Oregon Trail");
    expect(trail.trailLength).toBe(2040);
    expect(trail.locations[0].name).toBe("Independence");
    expect(trail.locations[0].kind).toBe(LocationKind.SETTLEMENT);
    expect(trail.locations[trail.locations.length - 1].name).toBe("Willamette Valley");
  });

  it("debe construir las alternativas de las bifurcaciones", () => {
    const trail = TrailRegistry.create("oregon");
    const southPass = trail.locations.find((l) => l.name === "South Pass");

    expect(southPass?.isFork).toBe(true);
    expect(southPass?.skipChoices.map((c) => c.name)).toEqual([
      "Green River Crossing",
      "Fort Bridger",
    ]);
  });

  it("debe devolver lugares nuevos en cada llamada", () => {
    const first = TrailRegistry.create("oregon");
    first.locations[0].setArrivalFlag();

    const second = TrailRegistry.create("oregon");

    expect(second.locations[0].status).toBe(LocationStatus.UNVISITED);
  });

  it("debe fallar con un id desconocido", () => {
    expect(() => TrailRegistry.create("santa-fe")).toThrow(
      'Unknown trail "santa-fe", expected one of: oregon',
    );
  });

  it("debe fallar con un tipo de lugar desconocido", () => {
    expect(() =>
      TrailRegistry.fromDefinition("bad", {
        name: "Bad",
        trailLength: 10,
        locations: [{ name: "Nowhere", kind: "volcano" }],
      }),
    ).toThrow('Unknown location kind "volcano" for Nowhere');
  });

  it("debe fallar con un modo desconocido", () => {
    expect(() =>
      TrailRegistry.fromDefinition("bad", {
        name: "Bad",
        trailLength: 10,
        locations: [{ name: "Nowhere", mode: "trading" }],
      }),
    ).toThrow('Unknown game mode "trading" for Nowhere');
  });
});

describe("FixedDistancePolicy", () => {
  it("debe devolver siempre la misma distancia", () => {
    const policy = new FixedDistancePolicy(12);
    const trail = createTestTrail();

    expect(policy.nextLegDistance({ trail, fromIndex: 0, remainingBudget: 100 })).toBe(12);
    expect(policy.nextLegDistance({ trail, fromIndex: 1, remainingBudget: 3 })).toBe(12);
  });

  it("debe usar una milla por defecto", () => {
    const policy = new FixedDistancePolicy();

    expect(
      policy.nextLegDistance({ trail: createTestTrail(), fromIndex: 0, remainingBudget: 100 }),
    ).toBe(1);
  });

  it("debe rechazar distancias no enteras o menores que uno", () => {
    expect(() => new FixedDistancePolicy(0)).toThrow(
      "Fixed leg distance must be a positive integer, got 0",
    );
    expect(() => new FixedDistancePolicy(2.5)).toThrow(
      "Fixed leg distance must be a positive integer, got 2.5",
    );
  });
});
