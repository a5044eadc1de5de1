import { LocationKind, LocationStatus } from "../../../../shared/constants/TrailEnums";
import { GameMode } from "../../../../shared/constants/ModeEnums";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";

export interface LocationOptions {
  kind?: LocationKind;
  mode?: GameMode;
  skipChoices?: Location[];
}

/**
 * Point of interest on the trail. Status only moves forward:
 * unvisited, then arrived, then departed.
 */
export class Location {
  public readonly name: string;
  public readonly kind: LocationKind;
  /** Mode pushed on the mode stack when the vehicle arrives here. */
  public readonly mode: GameMode;
  /** Alternate destinations offered when the trail forks here. */
  public readonly skipChoices: readonly Location[];
  private _status = LocationStatus.UNVISITED;

  constructor(name: string, options: LocationOptions = {}) {
    this.name = name;
    this.kind = options.kind ?? LocationKind.LANDMARK;
    this.mode = options.mode ?? GameMode.TRAVEL;
    this.skipChoices = options.skipChoices ?? [];
  }

  public get status(): LocationStatus {
    return this._status;
  }

  public get isFork(): boolean {
    return this.skipChoices.length > 0;
  }

  /**
   * Extra legs a detour taken here can add to the trail, counting forks
   * further down the alternate routes.
   */
  public get detourLegs(): number {
    if (!this.isFork) return 0;
    return 1 + Math.max(...this.skipChoices.map((choice) => choice.detourLegs));
  }

  public setArrivalFlag(): boolean {
    return this.advanceStatus(LocationStatus.UNVISITED, LocationStatus.ARRIVED);
  }

  public setDepartedFlag(): boolean {
    return this.advanceStatus(LocationStatus.ARRIVED, LocationStatus.DEPARTED);
  }

  private advanceStatus(from: LocationStatus, to: LocationStatus): boolean {
    if (this._status !== from) {
      logger.debug(
        `Ignoring ${this._status} -> ${to} for ${this.name}`,
        LogCategory.TRAIL,
      );
      return false;
    }
    this._status = to;
    return true;
  }
}
