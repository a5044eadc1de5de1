import type { Location } from "./Location";
import { LocationStatus } from "../../../../shared/constants/TrailEnums";

/**
 * Ordered list of locations plus the mileage ceiling of the whole trail.
 * Insertion order is visit order.
 */
export class Trail {
  private readonly _locations: Location[];

  constructor(
    public readonly id: string,
    public readonly name: string,
    locations: Location[],
    public readonly trailLength: number,
  ) {
    if (locations.length === 0) {
      throw new Error(`Trail "${id}" must contain at least one location`);
    }
    const legs = locations.reduce(
      (total, location) => total + 1 + location.detourLegs,
      0,
    );
    if (!Number.isInteger(trailLength) || trailLength < legs) {
      throw new Error(
        `Trail "${id}" length ${trailLength} cannot fit ${legs} legs of at least one mile`,
      );
    }
    this._locations = [...locations];
  }

  public get locations(): readonly Location[] {
    return this._locations;
  }

  /**
   * Legs that detours may still add from the given index on. Forks already
   * departed no longer count.
   */
  public pendingDetourLegs(fromIndex: number): number {
    return this._locations
      .slice(fromIndex)
      .filter((location) => location.status !== LocationStatus.DEPARTED)
      .reduce((total, location) => total + location.detourLegs, 0);
  }

  /**
   * Splices a location right after the given index. Locations up to and
   * including the index keep their position.
   */
  public insertAfter(index: number, location: Location): void {
    this._locations.splice(index + 1, 0, location);
  }
}
