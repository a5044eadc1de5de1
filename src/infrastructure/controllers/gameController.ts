import { Request, Response } from "express";

import { logger, LogCategory } from "../utils/logger";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../../shared/constants/ResponseEnums";
import { SimulationCommandType } from "../../shared/constants/CommandEnums";
import { parseSimulationCommand } from "../../shared/types/commands/SimulationCommand";
import { simulationRunner } from "../../domain/simulation/core/index";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * Controller for the game's HTTP surface: the current screen, the full
 * snapshot, and the command queue.
 *
 * @remarks
 * Input and commands are only queued here; they are applied on the next
 * simulation tick, so responses never contain the resulting screen.
 */
export class GameController {
  healthCheck(_req: Request, res: Response): void {
    try {
      res.json({
        status: ResponseStatus.OK,
        tick: simulationRunner.getTickCounter(),
        scheduler: simulationRunner.getSchedulerStats(),
      });
    } catch (error) {
      logger.error("Error getting health:", LogCategory.HTTP, errorMessage(error));
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to get health" });
    }
  }

  getScreen(_req: Request, res: Response): void {
    try {
      res.json({ screen: simulationRunner.getScreen() });
    } catch (error) {
      logger.error("Error rendering screen:", LogCategory.HTTP, errorMessage(error));
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to render screen" });
    }
  }

  getState(_req: Request, res: Response): void {
    try {
      res.json(simulationRunner.getSnapshot());
    } catch (error) {
      logger.error("Error getting game state:", LogCategory.HTTP, errorMessage(error));
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to get game state" });
    }
  }

  /**
   * Queues one line of player input for the active mode or form.
   */
  submitInput(req: Request, res: Response): void {
    try {
      const body: unknown = req.body;
      const input =
        typeof body === "object" && body !== null && "input" in body
          ? body.input
          : undefined;

      if (typeof input !== "string") {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: "Invalid request: input must be a string",
        });
        return;
      }

      simulationRunner.enqueueCommand({
        type: SimulationCommandType.PLAYER_INPUT,
        input,
      });
      res.status(HttpStatusCode.ACCEPTED).json({ status: ResponseStatus.QUEUED });
    } catch (error) {
      logger.error("Error queueing input:", LogCategory.HTTP, errorMessage(error));
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to queue input" });
    }
  }

  submitCommand(req: Request, res: Response): void {
    try {
      const command = parseSimulationCommand(req.body);
      if (!command) {
        res
          .status(HttpStatusCode.BAD_REQUEST)
          .json({ error: "Invalid simulation command" });
        return;
      }

      simulationRunner.enqueueCommand(command);
      res
        .status(HttpStatusCode.ACCEPTED)
        .json({ status: ResponseStatus.QUEUED, type: command.type });
    } catch (error) {
      logger.error("Error queueing command:", LogCategory.HTTP, errorMessage(error));
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "Failed to queue command" });
    }
  }
}

export const gameController = new GameController();
