import type { FormKind, GameMode } from "../../../shared/constants/ModeEnums";
import type { SimulationContext } from "../states/SimulationContext";
import type { StateTransition } from "../states/transitions";

/**
 * Behavior of a mode while no form is attached to it.
 */
export interface GameModeHandler {
  readonly mode: GameMode;
  /** Form attached as soon as the mode is pushed, if any. */
  initialForm(context: SimulationContext): FormKind | undefined;
  render(context: SimulationContext): string;
  onInput(input: string, context: SimulationContext): StateTransition;
}
