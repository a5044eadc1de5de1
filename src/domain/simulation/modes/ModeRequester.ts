import type { GameMode } from "../../../shared/constants/ModeEnums";

/**
 * The part of the mode stack that simulation modules are allowed to drive.
 */
export interface ModeRequester {
  addMode(mode: GameMode): void;
}
