import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import { simulationEvents, GameEventType } from "../../core/events";
import { logger } from "../../../../infrastructure/utils/logger";
import type { SimulationModule } from "../SimulationModule";

export interface TimeConfig {
  /** First day of the journey, YYYY-MM-DD. */
  startDate: string;
}

export interface GameDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

const DAY_MS = 24 * 60 * 60 * 1000;

function parseStartDate(value: string): number {
  const [year, month, day] = value.split("-").map(Number);
  const utc = Date.UTC(year, month - 1, day);
  if (Number.isNaN(utc)) {
    throw new Error(`Invalid start date "${value}"`);
  }
  return utc;
}

export function formatGameDate(date: GameDate): string {
  return `${MONTH_NAMES[date.month - 1]} ${date.day}, ${date.year}`;
}

/**
 * Calendar of the journey. One fixed-interval tick is one day and one turn.
 */
@injectable()
export class TimeModule implements SimulationModule {
  private readonly startUtc: number;
  private currentUtc: number;
  private _totalTurns = 0;

  constructor(@inject(TYPES.TimeConfig) config: TimeConfig) {
    this.startUtc = parseStartDate(config.startDate);
    this.currentUtc = this.startUtc;
  }

  public get totalTurns(): number {
    return this._totalTurns;
  }

  public get date(): GameDate {
    const current = new Date(this.currentUtc);
    return {
      year: current.getUTCFullYear(),
      month: current.getUTCMonth() + 1,
      day: current.getUTCDate(),
    };
  }

  public get formattedDate(): string {
    return formatGameDate(this.date);
  }

  public onTick(systemTick: boolean): void {
    if (systemTick) return;
    this.advanceTurn();
  }

  public advanceTurn(): void {
    this.currentUtc += DAY_MS;
    this._totalTurns++;
    logger.setTurn(this._totalTurns);
    simulationEvents.queueEvent(GameEventType.TURN_ADVANCED, {
      turn: this._totalTurns,
      date: this.date,
    });
  }

  public destroy(): void {
    this.currentUtc = this.startUtc;
    this._totalTurns = 0;
    logger.setTurn(0);
  }
}
