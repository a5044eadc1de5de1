import { ItemKind } from "../../../../shared/constants/VehicleEnums";

export interface InventoryItem {
  name: string;
  quantity: number;
}

export const ITEM_NAMES: Record<ItemKind, string> = {
  [ItemKind.CASH]: "Cash",
  [ItemKind.OXEN]: "Oxen",
  [ItemKind.FOOD]: "Food",
  [ItemKind.CLOTHING]: "Clothing",
  [ItemKind.AMMO]: "Ammunition",
  [ItemKind.WHEEL]: "Spare Wheels",
  [ItemKind.AXLE]: "Spare Axles",
  [ItemKind.TONGUE]: "Spare Tongues",
};

const ITEM_ORDER: readonly ItemKind[] = Object.values(ItemKind);

export type Supplies = Partial<Record<ItemKind, number>>;

/**
 * Supplies carried by the vehicle. Iteration always follows the ItemKind
 * declaration order, regardless of when an item was first added.
 */
export class Inventory {
  private readonly items = new Map<ItemKind, InventoryItem>();

  constructor(supplies: Supplies = {}) {
    for (const kind of ITEM_ORDER) {
      const quantity = supplies[kind];
      if (quantity !== undefined) {
        this.items.set(kind, { name: ITEM_NAMES[kind], quantity: Math.max(0, quantity) });
      }
    }
  }

  public quantity(kind: ItemKind): number {
    return this.items.get(kind)?.quantity ?? 0;
  }

  public add(kind: ItemKind, amount: number): number {
    const item = this.items.get(kind);
    if (item) {
      item.quantity = Math.max(0, item.quantity + amount);
      return item.quantity;
    }
    const quantity = Math.max(0, amount);
    this.items.set(kind, { name: ITEM_NAMES[kind], quantity });
    return quantity;
  }

  /**
   * Removes up to `amount` and returns what was actually taken.
   */
  public remove(kind: ItemKind, amount: number): number {
    const item = this.items.get(kind);
    if (!item) return 0;
    const removed = Math.min(item.quantity, Math.max(0, amount));
    item.quantity -= removed;
    return removed;
  }

  public entries(): Array<[ItemKind, InventoryItem]> {
    const result: Array<[ItemKind, InventoryItem]> = [];
    for (const kind of ITEM_ORDER) {
      const item = this.items.get(kind);
      if (item) result.push([kind, { ...item }]);
    }
    return result;
  }

  public toRecord(): Supplies {
    const record: Supplies = {};
    for (const [kind, item] of this.entries()) {
      record[kind] = item.quantity;
    }
    return record;
  }
}
