import { describe, it, expect } from "vitest";
import { Inventory } from "../../src/domain/simulation/systems/vehicle/Inventory";
import { ItemKind } from "../../src/shared/constants/VehicleEnums";

describe("Inventory", () => {
  it("debe recorrer los artículos en el orden de declaración", () => {
    const inventory = new Inventory({ [ItemKind.FOOD]: 10, [ItemKind.CASH]: 5 });
    inventory.add(ItemKind.OXEN, 2);

    expect(inventory.entries().map(([kind]) => kind)).toEqual([
      ItemKind.CASH,
      ItemKind.OXEN,
      ItemKind.FOOD,
    ]);
  });

  it("debe nombrar los artículos para la pantalla", () => {
    const inventory = new Inventory({ [ItemKind.WHEEL]: 1 });

    expect(inventory.entries()).toEqual([[ItemKind.WHEEL, { name: "Spare Wheels", quantity: 1 }]]);
  });

  it("no debe aceptar cantidades negativas", () => {
    const inventory = new Inventory({ [ItemKind.AMMO]: -5 });

    expect(inventory.quantity(ItemKind.AMMO)).toBe(0);
    expect(inventory.add(ItemKind.AMMO, -3)).toBe(0);
  });

  it("debe quitar como máximo lo que hay", () => {
    const inventory = new Inventory({ [ItemKind.FOOD]: 15 });

    expect(inventory.remove(ItemKind.FOOD, 20)).toBe(15);
    expect(inventory.quantity(ItemKind.FOOD)).toBe(0);
    expect(inventory.remove(ItemKind.CLOTHING, 1)).toBe(0);
  });

  it("debe devolver copias de los artículos", () => {
    const inventory = new Inventory({ [ItemKind.FOOD]: 15 });

    const [[, item]] = inventory.entries();
    item.quantity = 99;

    expect(inventory.quantity(ItemKind.FOOD)).toBe(15);
  });
});
