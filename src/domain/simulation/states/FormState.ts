import type { FormKind } from "../../../shared/constants/ModeEnums";
import type { SimulationContext } from "./SimulationContext";
import type { StateTransition } from "./transitions";

/**
 * A screen attached on top of a mode. Rendering never mutates anything, so
 * calling render() repeatedly returns the same text until input arrives.
 */
export abstract class FormState {
  public abstract readonly kind: FormKind;

  constructor(protected readonly context: SimulationContext) {}

  public abstract render(): string;

  public abstract onInput(input: string): StateTransition;
}
