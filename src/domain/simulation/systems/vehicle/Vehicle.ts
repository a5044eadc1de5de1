import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import { Inventory, type Supplies } from "./Inventory";
import { ItemKind, TravelPace } from "../../../../shared/constants/VehicleEnums";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import type { VehicleSnapshot } from "../../../../shared/types/game-types";

export interface VehicleConfig {
  /** Miles covered per turn at a steady pace. */
  baseMileage: number;
  supplies?: Supplies;
  pace?: TravelPace;
}

export const DEFAULT_SUPPLIES: Supplies = {
  [ItemKind.CASH]: 400,
  [ItemKind.OXEN]: 6,
  [ItemKind.FOOD]: 500,
  [ItemKind.CLOTHING]: 10,
  [ItemKind.AMMO]: 200,
  [ItemKind.WHEEL]: 1,
  [ItemKind.AXLE]: 1,
  [ItemKind.TONGUE]: 1,
};

const PACE_MULTIPLIERS: Record<TravelPace, number> = {
  [TravelPace.STEADY]: 1,
  [TravelPace.STRENUOUS]: 1.5,
  [TravelPace.GRUELING]: 2,
};

const PACE_ORDER: readonly TravelPace[] = Object.values(TravelPace);

/**
 * The player's wagon: how far it moves each turn, whether it is parked, and
 * what it carries.
 */
@injectable()
export class Vehicle {
  private _parked = false;
  private _pace: TravelPace;
  private _inventory: Inventory;

  constructor(@inject(TYPES.VehicleConfig) private readonly config: VehicleConfig) {
    this._pace = config.pace ?? TravelPace.STEADY;
    this._inventory = new Inventory(config.supplies ?? DEFAULT_SUPPLIES);
  }

  public get parked(): boolean {
    return this._parked;
  }

  public get pace(): TravelPace {
    return this._pace;
  }

  public get inventory(): Inventory {
    return this._inventory;
  }

  /**
   * Distance covered per turn. A parked wagon or one without oxen does not move.
   */
  public get mileage(): number {
    if (this._parked || this._inventory.quantity(ItemKind.OXEN) <= 0) {
      return 0;
    }
    return Math.round(this.config.baseMileage * PACE_MULTIPLIERS[this._pace]);
  }

  public park(): void {
    this._parked = true;
  }

  public drive(): void {
    this._parked = false;
  }

  public setPace(pace: TravelPace): void {
    if (pace === this._pace) return;
    logger.info(`Pace changed from ${this._pace} to ${pace}`, LogCategory.VEHICLE);
    this._pace = pace;
  }

  /**
   * Moves to the next pace, wrapping from grueling back to steady.
   */
  public cyclePace(): TravelPace {
    const next = PACE_ORDER[(PACE_ORDER.indexOf(this._pace) + 1) % PACE_ORDER.length];
    this.setPace(next);
    return next;
  }

  public reset(): void {
    this._parked = false;
    this._pace = this.config.pace ?? TravelPace.STEADY;
    this._inventory = new Inventory(this.config.supplies ?? DEFAULT_SUPPLIES);
  }

  public getSnapshot(): VehicleSnapshot {
    return {
      parked: this._parked,
      pace: this._pace,
      mileage: this.mileage,
      inventory: this._inventory.toRecord(),
    };
  }
}
