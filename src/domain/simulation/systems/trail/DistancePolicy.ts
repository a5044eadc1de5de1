import type { Trail } from "./Trail";

export interface LegRequest {
  trail: Trail;
  /** Index of the location the leg starts from. */
  fromIndex: number;
  /** Trail length not yet handed out to earlier legs. */
  remainingBudget: number;
}

/**
 * Decides how long the next leg of the trail is. TrailModule clamps the
 * answer to [1, remainingBudget].
 */
export interface DistancePolicy {
  nextLegDistance(request: LegRequest): number;
}

/**
 * Every leg has the same length.
 */
export class FixedDistancePolicy implements DistancePolicy {
  constructor(private readonly distance = 1) {
    if (!Number.isInteger(distance) || distance < 1) {
      throw new Error(`Fixed leg distance must be a positive integer, got ${distance}`);
    }
  }

  public nextLegDistance(_request: LegRequest): number {
    return this.distance;
  }
}
