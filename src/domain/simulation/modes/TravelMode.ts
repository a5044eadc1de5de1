import { FormKind, GameMode } from "../../../shared/constants/ModeEnums";
import { LocationStatus } from "../../../shared/constants/TrailEnums";
import { parseChoice } from "../input/InputBuffer";
import type { SimulationContext } from "../states/SimulationContext";
import { Transitions, type StateTransition } from "../states/transitions";
import type { GameModeHandler } from "./GameModeHandler";

enum TravelChoice {
  CONTINUE = 1,
  CHECK_SUPPLIES = 2,
  LOOK_AT_MAP = 3,
  CHANGE_PACE = 4,
}

const MENU =
  "You may:\n\n" +
  "  1. Continue on trail\n" +
  "  2. Check supplies\n" +
  "  3. Look at map\n" +
  "  4. Change pace";

/**
 * Main travel screen: status lines plus the travel menu.
 */
export class TravelMode implements GameModeHandler {
  public readonly mode = GameMode.TRAVEL;

  public initialForm({ trail }: SimulationContext): FormKind | undefined {
    const current = trail.currentLocation;
    if (current?.isFork && current.status === LocationStatus.ARRIVED) {
      return FormKind.LOCATION_FORK;
    }
    return undefined;
  }

  public render({ trail, vehicle, time, history }: SimulationContext): string {
    const next = trail.nextLocation;
    let screen = `\n${time.formattedDate}\n`;
    screen += `Location: ${trail.currentLocation?.name ?? "the trail"}\n`;
    screen += `Next landmark: ${next ? next.name : "end of the trail"}\n`;
    screen += `Miles traveled: ${trail.distanceTraveled}\n`;
    screen += `Pace: ${vehicle.pace}\n`;
    const latest = history.latest;
    if (latest) {
      screen += `Last event: ${latest.outcome}\n`;
    }
    return `${screen}\n${MENU}`;
  }

  public onInput(input: string, { trail, vehicle }: SimulationContext): StateTransition {
    switch (parseChoice(input)) {
      case TravelChoice.CONTINUE:
        // Only meaningful while stopped at a location that has not been left yet.
        if (vehicle.parked && trail.currentLocation?.status === LocationStatus.ARRIVED) {
          return Transitions.setForm(FormKind.CONTINUE_ON_TRAIL);
        }
        return Transitions.none();
      case TravelChoice.CHECK_SUPPLIES:
        return Transitions.setForm(FormKind.CHECK_SUPPLIES);
      case TravelChoice.LOOK_AT_MAP:
        return Transitions.setForm(FormKind.LOOK_AT_MAP);
      case TravelChoice.CHANGE_PACE:
        vehicle.cyclePace();
        return Transitions.none();
      default:
        return Transitions.none();
    }
  }
}
