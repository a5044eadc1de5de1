import { FormState } from "./FormState";
import type { StateTransition } from "./transitions";

export interface DialogResponse {
  /** Sanitized input line; empty when the player only pressed enter. */
  text: string;
}

/**
 * A prompt that accepts any input as its answer.
 */
export abstract class DialogState extends FormState {
  public render(): string {
    return this.onDialogPrompt();
  }

  public onInput(input: string): StateTransition {
    return this.onDialogResponse({ text: input });
  }

  protected abstract onDialogPrompt(): string;

  protected abstract onDialogResponse(response: DialogResponse): StateTransition;
}
