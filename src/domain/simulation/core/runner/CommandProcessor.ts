import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import type { SimulationCommand } from "../../../../shared/types/commands/SimulationCommand";
import { SimulationCommandType } from "../../../../shared/constants/CommandEnums";
import type { SimulationRunner } from "../SimulationRunner";

export const MIN_TIME_SCALE = 0.1;
export const MAX_TIME_SCALE = 10;

export class CommandProcessor {
  constructor(private runner: SimulationRunner) {}

  /**
   * Drains the queue in arrival order. A failing command is logged and the
   * rest still run.
   */
  public process(commands: SimulationCommand[]): void {
    while (commands.length > 0) {
      const command = commands.shift();
      if (!command) break;
      logger.debug(`Processing command: ${command.type}`, LogCategory.SIMULATION);
      try {
        this.dispatchCommand(command);
      } catch (error) {
        logger.error(`Failed to process command ${command.type}`, LogCategory.SIMULATION, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private dispatchCommand(command: SimulationCommand): void {
    switch (command.type) {
      case SimulationCommandType.PLAYER_INPUT:
        this.runner.modes.handleInput(command.input);
        break;
      case SimulationCommandType.SET_PACE:
        this.runner.vehicle.setPace(command.pace);
        break;
      case SimulationCommandType.SET_TIME_SCALE:
        this.runner.setTimeScale(
          Math.max(MIN_TIME_SCALE, Math.min(MAX_TIME_SCALE, command.multiplier)),
        );
        break;
      case SimulationCommandType.RESET:
        this.runner.reset();
        break;
      case SimulationCommandType.PING:
        logger.debug("PING received", LogCategory.SIMULATION);
        break;
    }
  }
}
