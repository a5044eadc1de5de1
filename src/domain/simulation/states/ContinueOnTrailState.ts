import { FormKind } from "../../../shared/constants/ModeEnums";
import { DialogState } from "./DialogState";
import { Transitions, type StateTransition } from "./transitions";

/**
 * Tells the player how far the next stop is, then sends the wagon off.
 */
export class ContinueOnTrailState extends DialogState {
  public readonly kind = FormKind.CONTINUE_ON_TRAIL;

  protected onDialogPrompt(): string {
    const { trail } = this.context;
    const from = trail.currentLocation?.name ?? "the trail";
    const next = trail.nextLocation;
    const destination = next ? `the ${next.name}` : "the end of the trail";
    return `\nFrom ${from} it is ${trail.legDistance}\nmiles to ${destination}\n\n`;
  }

  protected onDialogResponse(): StateTransition {
    this.context.trail.departCurrentLocation();
    return Transitions.close();
  }
}
