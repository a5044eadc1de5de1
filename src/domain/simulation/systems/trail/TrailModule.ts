import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import { Trail } from "./Trail";
import type { Location } from "./Location";
import { TrailRegistry } from "./TrailRegistry";
import type { DistancePolicy } from "./DistancePolicy";
import { Vehicle } from "../vehicle/Vehicle";
import { TimeModule } from "../core/TimeModule";
import type { ModeRequester } from "../../modes/ModeRequester";
import type { SimulationModule } from "../SimulationModule";
import { GameMode } from "../../../../shared/constants/ModeEnums";
import { LocationStatus } from "../../../../shared/constants/TrailEnums";
import { simulationEvents, GameEventType } from "../../core/events";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import type { TrailSnapshot } from "../../../../shared/types/game-types";

export interface TrailConfig {
  /** Registry id of the trail loaded on start and on reset. */
  trailId: string;
}

/**
 * Tracks the vehicle along the ordered locations of the loaded trail.
 *
 * Between two locations `distanceToNextLocation` is positive and shrinks by
 * the vehicle mileage every turn. At a location it stays at zero until the
 * player departs and {@link TrailModule.beginNextLeg} loads the leg that was
 * generated on arrival.
 *
 * Index rule: valid locations are `0..length-1`; an index equal to the
 * number of locations means the trail is complete.
 */
@injectable()
export class TrailModule implements SimulationModule {
  private trail?: Trail;
  private _locationIndex = 0;
  private _distanceToNextLocation = 0;
  private _legDistance = 0;
  private _distanceTraveled = 0;
  private distanceAllotted = 0;

  constructor(
    @inject(TYPES.TrailConfig) private readonly config: TrailConfig,
    @inject(TYPES.DistancePolicy) private readonly policy: DistancePolicy,
    @inject(TYPES.Vehicle) private readonly vehicle: Vehicle,
    @inject(TYPES.TimeModule) private readonly time: TimeModule,
    @inject(TYPES.ModeRequester) private readonly modes: ModeRequester,
  ) {
    this.load(TrailRegistry.create(config.trailId));
  }

  /**
   * Replaces the active trail and rewinds progress to its first location.
   */
  public load(trail: Trail): void {
    this.trail = trail;
    this._locationIndex = 0;
    this._distanceToNextLocation = 0;
    this._legDistance = 0;
    this._distanceTraveled = 0;
    this.distanceAllotted = 0;
    logger.info(
      `Loaded trail "${trail.name}" (${trail.locations.length} locations, ${trail.trailLength} miles)`,
      LogCategory.TRAIL,
    );
  }

  public reset(): void {
    this.load(TrailRegistry.create(this.config.trailId));
  }

  public get trailId(): string {
    return this.trail?.id ?? "";
  }

  public get trailName(): string {
    return this.trail?.name ?? "";
  }

  public get trailLength(): number {
    return this.trail?.trailLength ?? 0;
  }

  public get locations(): readonly Location[] {
    return this.trail?.locations ?? [];
  }

  public get locationIndex(): number {
    return this._locationIndex;
  }

  public get distanceToNextLocation(): number {
    return this._distanceToNextLocation;
  }

  public get legDistance(): number {
    return this._legDistance;
  }

  public get distanceTraveled(): number {
    return this._distanceTraveled;
  }

  public get isComplete(): boolean {
    return this._locationIndex >= this.locations.length;
  }

  public get currentLocation(): Location | undefined {
    return this.locations[this._locationIndex];
  }

  /**
   * Location after the current one, or undefined at the last location and
   * once the trail is complete.
   */
  public get nextLocation(): Location | undefined {
    const nextIndex = this._locationIndex + 1;
    return nextIndex >= this.locations.length ? undefined : this.locations[nextIndex];
  }

  public get reachedNextPoint(): boolean {
    return (
      this.currentLocation?.status === LocationStatus.ARRIVED && this.vehicle.parked
    );
  }

  public get isFirstLocation(): boolean {
    return this._locationIndex <= 0 && this.time.totalTurns <= 0 && this.vehicle.parked;
  }

  /**
   * Moves the vehicle one turn along the current leg. System ticks carry no
   * game time and are ignored.
   */
  public onTick(systemTick: boolean): void {
    if (systemTick || !this.trail) return;

    const mileage = this.vehicle.mileage;
    const remaining = this._distanceToNextLocation - mileage;
    this._distanceTraveled += Math.min(this._distanceToNextLocation, mileage);

    if (remaining <= 0) {
      this._distanceToNextLocation = 0;
      this.arriveAtNextLocation();
      return;
    }

    this._distanceToNextLocation = remaining;
  }

  public arriveAtNextLocation(): void {
    if (!this.trail || this.isComplete) return;

    // The very first tick arrives at the starting location without moving.
    const nextIndex =
      this.time.totalTurns > 0 ? this._locationIndex + 1 : this._locationIndex;

    if (nextIndex >= this.trail.locations.length) {
      this._locationIndex = nextIndex;
      this._legDistance = 0;
      logger.info(`Reached the end of ${this.trail.name}`, LogCategory.TRAIL);
      simulationEvents.queueEvent(GameEventType.TRAIL_COMPLETED, {
        trailId: this.trail.id,
        distanceTraveled: this._distanceTraveled,
      });
      this.modes.addMode(GameMode.END_GAME);
      return;
    }

    this._locationIndex = nextIndex;
    this._legDistance = this.generateLegDistance(this.trail);
    this.distanceAllotted += this._legDistance;

    const location = this.trail.locations[nextIndex];
    location.setArrivalFlag();
    this.vehicle.park();

    logger.info(`Arrived at ${location.name}`, LogCategory.TRAIL, {
      index: nextIndex,
      legDistance: this._legDistance,
    });
    simulationEvents.queueEvent(GameEventType.TRAIL_ARRIVED, {
      location: location.name,
      index: nextIndex,
    });
    this.modes.addMode(location.mode);
  }

  /**
   * Marks the current location departed. Returns false when there is nothing
   * to depart from or the location was not in the arrived state.
   */
  public departCurrentLocation(): boolean {
    const location = this.currentLocation;
    if (!location?.setDepartedFlag()) return false;

    simulationEvents.queueEvent(GameEventType.LOCATION_DEPARTED, {
      location: location.name,
      index: this._locationIndex,
    });
    return true;
  }

  /**
   * Starts counting down the leg generated on arrival, once the player has
   * departed the current location.
   */
  public beginNextLeg(): boolean {
    if (
      this.currentLocation?.status !== LocationStatus.DEPARTED ||
      this._distanceToNextLocation > 0 ||
      this._legDistance <= 0
    ) {
      return false;
    }
    this._distanceToNextLocation = this._legDistance;
    return true;
  }

  /**
   * Splices a location right after the current one. Visited locations keep
   * their positions. Returns false when the miles left in the trail cannot
   * give every leg after the insert at least one mile.
   */
  public insertLocation(location: Location): boolean {
    if (!this.trail || this.isComplete) return false;

    const legsAfterInsert =
      this.trail.locations.length -
      this._locationIndex +
      this.trail.pendingDetourLegs(this._locationIndex + 1) +
      location.detourLegs;
    const remainingBudget = this.trail.trailLength - this.distanceAllotted;
    if (legsAfterInsert > remainingBudget) {
      logger.warn(
        `Cannot insert ${location.name}: ${remainingBudget} miles left for ${legsAfterInsert} legs`,
        LogCategory.TRAIL,
      );
      return false;
    }

    this.trail.insertAfter(this._locationIndex, location);
    logger.info(
      `Route changed: ${location.name} inserted after ${this.currentLocation?.name}`,
      LogCategory.TRAIL,
    );
    simulationEvents.queueEvent(GameEventType.LOCATION_INSERTED, {
      location: location.name,
      index: this._locationIndex + 1,
    });
    return true;
  }

  public destroy(): void {
    this._locationIndex = 0;
    this._distanceToNextLocation = 0;
    this._legDistance = 0;
    this._distanceTraveled = 0;
    this.distanceAllotted = 0;
    this.trail = undefined;
  }

  public getSnapshot(): TrailSnapshot {
    return {
      trailId: this.trailId,
      trailName: this.trailName,
      trailLength: this.trailLength,
      locationIndex: this._locationIndex,
      distanceToNextLocation: this._distanceToNextLocation,
      legDistance: this._legDistance,
      distanceTraveled: this._distanceTraveled,
      complete: this.isComplete,
      locations: this.locations.map((location) => ({
        name: location.name,
        kind: location.kind,
        status: location.status,
      })),
    };
  }

  /**
   * Asks the policy for the next leg and keeps at least one mile of budget
   * for every leg still ahead, including legs a pending fork may add.
   */
  private generateLegDistance(trail: Trail): number {
    const legsAfter =
      trail.locations.length -
      1 -
      this._locationIndex +
      trail.pendingDetourLegs(this._locationIndex);
    const remainingBudget = trail.trailLength - this.distanceAllotted;
    const requested = this.policy.nextLegDistance({
      trail,
      fromIndex: this._locationIndex,
      remainingBudget,
    });
    const ceiling = Math.max(1, remainingBudget - legsAfter);
    if (!Number.isFinite(requested)) return 1;
    return Math.max(1, Math.min(Math.floor(requested), ceiling));
  }
}
