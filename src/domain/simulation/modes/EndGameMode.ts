import { GameMode } from "../../../shared/constants/ModeEnums";
import type { SimulationContext } from "../states/SimulationContext";
import { Transitions, type StateTransition } from "../states/transitions";
import type { GameModeHandler } from "./GameModeHandler";

export class EndGameMode implements GameModeHandler {
  public readonly mode = GameMode.END_GAME;

  public initialForm(): undefined {
    return undefined;
  }

  public render({ trail, time }: SimulationContext): string {
    return (
      `\nYou have reached the end of the ${trail.trailName}!\n\n` +
      `Miles traveled: ${trail.distanceTraveled}\n` +
      `Days on the trail: ${time.totalTurns}\n`
    );
  }

  // The journey is over; input no longer changes anything.
  public onInput(): StateTransition {
    return Transitions.none();
  }
}
