import { FormKind } from "../../../shared/constants/ModeEnums";
import { LocationStatus } from "../../../shared/constants/TrailEnums";
import { DialogState } from "./DialogState";
import { Transitions, type StateTransition } from "./transitions";

/**
 * Lists the route with the current position marked. Closing the map at an
 * unresolved fork goes back to the fork.
 */
export class LookAtMap extends DialogState {
  public readonly kind = FormKind.LOOK_AT_MAP;

  protected onDialogPrompt(): string {
    const { trail } = this.context;
    let prompt = `\n${trail.trailName}\n\n`;
    trail.locations.forEach((location, index) => {
      const marker = index === trail.locationIndex ? ">" : " ";
      const visited = location.status === LocationStatus.UNVISITED ? " " : "x";
      prompt += `${marker} [${visited}] ${location.name}\n`;
    });
    prompt += `\n${trail.distanceTraveled} of ${trail.trailLength} miles traveled\n`;
    return prompt;
  }

  protected onDialogResponse(): StateTransition {
    const current = this.context.trail.currentLocation;
    if (current?.isFork && current.status === LocationStatus.ARRIVED) {
      return Transitions.setForm(FormKind.LOCATION_FORK);
    }
    return Transitions.close();
  }
}
