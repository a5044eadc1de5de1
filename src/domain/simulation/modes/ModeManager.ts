import { injectable } from "inversify";
import {
  GameMode,
  TransitionType,
  type FormKind,
} from "../../../shared/constants/ModeEnums";
import type { FormState } from "../states/FormState";
import { createForm } from "../states/StateFactory";
import type { SimulationContext } from "../states/SimulationContext";
import { Transitions, type StateTransition } from "../states/transitions";
import { sanitizeInput } from "../input/InputBuffer";
import type { GameModeHandler } from "./GameModeHandler";
import type { ModeRequester } from "./ModeRequester";
import { TravelMode } from "./TravelMode";
import { EndGameMode } from "./EndGameMode";
import { simulationEvents, GameEventType } from "../core/events";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import type { ModeSnapshot } from "../../../shared/types/game-types";

interface ModeEntry {
  handler: GameModeHandler;
  state?: FormState;
}

/**
 * Stack of active game modes. Only the top mode, or the form attached to
 * it, receives input and renders. Pushing a mode that is already on the
 * stack moves it to the top.
 */
@injectable()
export class ModeManager implements ModeRequester {
  private readonly handlers: Record<GameMode, GameModeHandler> = {
    [GameMode.TRAVEL]: new TravelMode(),
    [GameMode.END_GAME]: new EndGameMode(),
  };
  private readonly stack: ModeEntry[] = [];
  private readonly runCounts = new Map<GameMode, number>();
  private context?: SimulationContext;

  public setContext(context: SimulationContext): void {
    this.context = context;
  }

  private requireContext(): SimulationContext {
    if (!this.context) {
      throw new Error("ModeManager has no simulation context");
    }
    return this.context;
  }

  private get top(): ModeEntry | undefined {
    return this.stack[this.stack.length - 1];
  }

  public get activeMode(): GameMode | undefined {
    return this.top?.handler.mode;
  }

  public get activeState(): FormState | undefined {
    return this.top?.state;
  }

  public get hasAttachedState(): boolean {
    return this.top?.state !== undefined;
  }

  public get modes(): GameMode[] {
    return this.stack.map((entry) => entry.handler.mode);
  }

  public getRunCount(mode: GameMode): number {
    return this.runCounts.get(mode) ?? 0;
  }

  public addMode(mode: GameMode): void {
    const context = this.requireContext();
    const existing = this.stack.findIndex((entry) => entry.handler.mode === mode);
    if (existing !== -1) {
      this.stack.splice(existing, 1);
    }

    const handler = this.handlers[mode];
    this.stack.push({ handler });
    this.runCounts.set(mode, this.getRunCount(mode) + 1);

    logger.debug(`Mode pushed: ${mode}`, LogCategory.MODES, {
      stack: this.modes,
    });
    simulationEvents.queueEvent(GameEventType.MODE_CHANGED, {
      mode,
      stack: this.modes,
    });

    const initialForm = handler.initialForm(context);
    if (initialForm) {
      this.attachState(initialForm);
    }
  }

  /**
   * Removes the given mode, or the top mode when none is given.
   */
  public removeMode(mode?: GameMode): void {
    const index =
      mode === undefined
        ? this.stack.length - 1
        : this.stack.findIndex((entry) => entry.handler.mode === mode);
    if (index < 0) return;

    const [removed] = this.stack.splice(index, 1);
    logger.debug(`Mode removed: ${removed.handler.mode}`, LogCategory.MODES);
    simulationEvents.queueEvent(GameEventType.MODE_CHANGED, {
      mode: this.activeMode,
      stack: this.modes,
    });
  }

  public attachState(kind: FormKind): void {
    const entry = this.top;
    if (!entry) {
      logger.warn(`Cannot attach ${kind} without an active mode`, LogCategory.MODES);
      return;
    }
    entry.state = createForm(kind, this.requireContext());
    logger.debug(`Form attached: ${kind}`, LogCategory.MODES);
  }

  public clearState(): void {
    const entry = this.top;
    if (entry) {
      entry.state = undefined;
    }
  }

  public applyTransition(transition: StateTransition): void {
    switch (transition.type) {
      case TransitionType.NONE:
        break;
      case TransitionType.CLOSE_STATE:
        this.clearState();
        break;
      case TransitionType.SET_FORM:
        this.attachState(transition.form);
        break;
      case TransitionType.ADD_MODE:
        this.addMode(transition.mode);
        break;
      case TransitionType.REMOVE_MODE:
        this.removeMode();
        break;
    }
  }

  /**
   * Text for the top of the stack: the attached form if there is one,
   * otherwise the mode's own screen.
   */
  public render(): string {
    const entry = this.top;
    if (!entry) return "";
    return entry.state
      ? entry.state.render()
      : entry.handler.render(this.requireContext());
  }

  public handleInput(raw: string): StateTransition {
    const entry = this.top;
    if (!entry) {
      logger.debug("Input received with no active mode", LogCategory.INPUT);
      return Transitions.none();
    }

    const input = sanitizeInput(raw);
    const transition = entry.state
      ? entry.state.onInput(input)
      : entry.handler.onInput(input, this.requireContext());
    this.applyTransition(transition);
    return transition;
  }

  public getSnapshot(): ModeSnapshot {
    return {
      activeMode: this.activeMode,
      activeForm: this.activeState?.kind,
      stack: this.modes,
    };
  }

  public destroy(): void {
    this.stack.length = 0;
    this.runCounts.clear();
  }
}
