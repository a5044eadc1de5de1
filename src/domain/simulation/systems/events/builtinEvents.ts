import { EventCategory } from "../../../../shared/constants/EventEnums";
import { ItemKind } from "../../../../shared/constants/VehicleEnums";
import type { RandomEvent } from "./RandomEvent";

export const brokenWheel: RandomEvent = {
  name: "Broken wheel",
  category: EventCategory.VEHICLE,
  rollChance: 0.02,
  execute(vehicle) {
    const replaced = vehicle.inventory.remove(ItemKind.WHEEL, 1);
    return replaced > 0
      ? "A wagon wheel broke. You replaced it with a spare."
      : "A wagon wheel broke and you have no spare.";
  },
};

export const thief: RandomEvent = {
  name: "Thief",
  category: EventCategory.PERSON,
  rollChance: 0.02,
  execute(vehicle) {
    const stolen = vehicle.inventory.remove(ItemKind.FOOD, 20);
    return `A thief comes during the night and steals ${stolen} pounds of food.`;
  },
};

export const wildFruit: RandomEvent = {
  name: "Wild fruit",
  category: EventCategory.WILD,
  rollChance: 0.03,
  execute(vehicle) {
    vehicle.inventory.add(ItemKind.FOOD, 15);
    return "You find wild fruit and gather 15 pounds of food.";
  },
};

export const BUILTIN_EVENTS: readonly RandomEvent[] = [brokenWheel, thief, wildFruit];
