import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { encodeMsgPack, decodeMessage } from "../shared/MessagePackCodec";
import { parseSimulationCommand } from "../shared/types/commands/SimulationCommand";
import { WebSocketMessageType } from "../shared/constants/WebSocketEnums";
import type { GameSnapshot } from "../shared/types/game-types";
import { logger, LogCategory } from "../infrastructure/utils/logger";

export const GAME_SOCKET_PATH = "/ws/game";

export type SocketMessage =
  | { type: WebSocketMessageType.SNAPSHOT; payload: GameSnapshot }
  | { type: WebSocketMessageType.TICK; payload: GameSnapshot }
  | { type: WebSocketMessageType.ERROR; message: string };

function toMessageData(data: RawData, isBinary: boolean): string | Buffer | ArrayBuffer {
  const buffer = Array.isArray(data) ? Buffer.concat(data) : data;
  if (isBinary) return buffer;
  return Buffer.isBuffer(buffer) ? buffer.toString("utf-8") : Buffer.from(buffer).toString("utf-8");
}

/**
 * Decodes one client frame and queues the command it carries. Returns the
 * error to send back, or undefined when the command was queued.
 */
export function handleSocketMessage(
  runner: Pick<SimulationRunner, "enqueueCommand">,
  raw: string | Buffer | ArrayBuffer,
): SocketMessage | undefined {
  let parsed: unknown;
  try {
    parsed = decodeMessage(raw);
  } catch (error) {
    logger.debug("Failed to parse socket frame", LogCategory.HTTP, {
      error: error instanceof Error ? error.message : String(error),
    });
    return { type: WebSocketMessageType.ERROR, message: "Failed to parse command" };
  }

  const command = parseSimulationCommand(parsed);
  if (!command) {
    return { type: WebSocketMessageType.ERROR, message: "Invalid command format" };
  }

  runner.enqueueCommand(command);
  return undefined;
}

/**
 * WebSocket server for game clients. Sends a snapshot on connect and one
 * frame per published tick; accepts the same commands as the HTTP API.
 */
export function createGameSocketServer(runner: SimulationRunner): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  wss.on("connection", (ws: WebSocket) => {
    logger.info("Client connected to game socket", LogCategory.HTTP);
    ws.send(
      encodeMsgPack<SocketMessage>({
        type: WebSocketMessageType.SNAPSHOT,
        payload: runner.getSnapshot(),
      }),
    );

    ws.on("message", (data: RawData, isBinary: boolean) => {
      const reply = handleSocketMessage(runner, toMessageData(data, isBinary));
      if (reply) {
        ws.send(encodeMsgPack(reply));
      }
    });
  });

  const broadcast = (snapshot: GameSnapshot): void => {
    const frame = encodeMsgPack<SocketMessage>({
      type: WebSocketMessageType.TICK,
      payload: snapshot,
    });
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(frame);
      }
    }
  };

  runner.on("tick", broadcast);
  wss.on("close", () => runner.off("tick", broadcast));

  return wss;
}
