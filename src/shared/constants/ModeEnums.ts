/**
 * Game mode and form enumerations.
 *
 * Modes live on the mode stack; forms and dialogs are the states a mode hosts.
 *
 * @module shared/constants/ModeEnums
 */

/**
 * Enumeration of game modes that can be pushed on the mode stack.
 */
export enum GameMode {
  TRAVEL = "travel",
  END_GAME = "end_game",
}

/**
 * Enumeration of the states (dialogs and forms) a mode can attach.
 */
export enum FormKind {
  CONTINUE_ON_TRAIL = "continue_on_trail",
  CHECK_SUPPLIES = "check_supplies",
  LOCATION_FORK = "location_fork",
  LOCATION_DEPART = "location_depart",
  LOOK_AT_MAP = "look_at_map",
}

/**
 * Kinds of transition a state can ask the mode manager to apply.
 */
export enum TransitionType {
  NONE = "none",
  CLOSE_STATE = "close_state",
  SET_FORM = "set_form",
  ADD_MODE = "add_mode",
  REMOVE_MODE = "remove_mode",
}
