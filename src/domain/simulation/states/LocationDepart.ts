import { FormKind } from "../../../shared/constants/ModeEnums";
import { DialogState } from "./DialogState";
import { Transitions, type StateTransition } from "./transitions";

/**
 * Confirms the route picked at a fork and leaves the current location.
 */
export class LocationDepart extends DialogState {
  public readonly kind = FormKind.LOCATION_DEPART;

  protected onDialogPrompt(): string {
    const { trail } = this.context;
    const next = trail.nextLocation;
    const destination = next ? next.name : "the end of the trail";
    return `\nYou leave ${trail.currentLocation?.name ?? "the trail"} and head for ${destination}.\nIt is ${trail.legDistance} miles away.\n\n`;
  }

  protected onDialogResponse(): StateTransition {
    this.context.trail.departCurrentLocation();
    return Transitions.close();
  }
}
