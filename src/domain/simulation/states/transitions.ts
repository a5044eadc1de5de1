import {
  TransitionType,
  type FormKind,
  type GameMode,
} from "../../../shared/constants/ModeEnums";

/**
 * What a mode or form asks the mode manager to do after handling input.
 */
export type StateTransition =
  | { type: TransitionType.NONE }
  | { type: TransitionType.CLOSE_STATE }
  | { type: TransitionType.SET_FORM; form: FormKind }
  | { type: TransitionType.ADD_MODE; mode: GameMode }
  | { type: TransitionType.REMOVE_MODE };

export const Transitions = {
  none: (): StateTransition => ({ type: TransitionType.NONE }),
  close: (): StateTransition => ({ type: TransitionType.CLOSE_STATE }),
  setForm: (form: FormKind): StateTransition => ({
    type: TransitionType.SET_FORM,
    form,
  }),
  addMode: (mode: GameMode): StateTransition => ({
    type: TransitionType.ADD_MODE,
    mode,
  }),
  removeMode: (): StateTransition => ({ type: TransitionType.REMOVE_MODE }),
};
