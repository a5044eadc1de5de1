import "dotenv/config";
import app from "./app";
import { CONFIG } from "../config/config";
import { simulationRunner } from "../domain/simulation/core/index";
import { createGameSocketServer, GAME_SOCKET_PATH } from "./gameSocket";
import { logger, LogCategory } from "../infrastructure/utils/logger";

/**
 * Main server entry point.
 *
 * Starts the simulation runner, the HTTP API and the game socket at
 * `/ws/game`.
 *
 * @module application
 */

const gameSocket = createGameSocketServer(simulationRunner);

const server = app.listen(CONFIG.PORT, () => {
  logger.info(
    `Trail server running on http://localhost:${CONFIG.PORT}`,
    LogCategory.HTTP,
  );
});

server.on("upgrade", (request, socket, head) => {
  const host = request.headers.host ?? "localhost";
  const url = request.url ?? "/";
  let pathname: string;
  try {
    pathname = new URL(url, `http://${host}`).pathname;
  } catch (error) {
    logger.debug("Invalid URL in WebSocket upgrade request", LogCategory.HTTP, {
      url,
      host,
      error: error instanceof Error ? error.message : String(error),
    });
    socket.destroy();
    return;
  }

  if (pathname === GAME_SOCKET_PATH) {
    gameSocket.handleUpgrade(request, socket, head, (ws) => {
      gameSocket.emit("connection", ws, request);
    });
    return;
  }

  socket.destroy();
});

simulationRunner.start();

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`, LogCategory.SIMULATION);
  simulationRunner.destroy();
  gameSocket.close();
  server.close(() => {
    logger
      .flush()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Failed to flush logs:", LogCategory.GENERAL, err);
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
