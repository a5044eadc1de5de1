import { FormKind } from "../../../shared/constants/ModeEnums";
import type { Location } from "../systems/trail/Location";
import { parseChoice } from "../input/InputBuffer";
import { FormState } from "./FormState";
import type { SimulationContext } from "./SimulationContext";
import { Transitions, type StateTransition } from "./transitions";

/**
 * Offers the alternate routes configured on the current location. The
 * choices are numbered from one, followed by one extra entry for the map.
 * Without alternate routes only the header is shown; any positive number
 * still opens the map.
 */
export class LocationFork extends FormState {
  public readonly kind = FormKind.LOCATION_FORK;
  private readonly skipChoices = new Map<number, Location>();

  constructor(context: SimulationContext) {
    super(context);
    const choices = context.trail.currentLocation?.skipChoices ?? [];
    choices.forEach((location, index) => {
      this.skipChoices.set(index + 1, location);
    });
  }

  public render(): string {
    let prompt = "\nThe trail divides here. You may:\n\n";
    if (this.skipChoices.size === 0) return prompt;

    for (const [choice, location] of this.skipChoices) {
      prompt += `  ${choice}. head for ${location.name}\n`;
    }
    prompt += `  ${this.skipChoices.size + 1}. see the map`;
    return prompt;
  }

  public onInput(input: string): StateTransition {
    const choice = parseChoice(input);
    if (choice === undefined || choice <= 0) {
      return Transitions.none();
    }

    const location = this.skipChoices.get(choice);
    if (!location) {
      return Transitions.setForm(FormKind.LOOK_AT_MAP);
    }

    if (!this.context.trail.insertLocation(location)) {
      return Transitions.none();
    }
    return Transitions.setForm(FormKind.LOCATION_DEPART);
  }
}
