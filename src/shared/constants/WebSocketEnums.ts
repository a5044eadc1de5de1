/**
 * WebSocket message type enumerations for the game socket.
 *
 * @module shared/constants/WebSocketEnums
 */

/**
 * Messages the server sends to connected clients.
 */
export enum WebSocketMessageType {
  /** Full game snapshot, sent once on connect. */
  SNAPSHOT = "SNAPSHOT",
  /** Game snapshot published after a tick that changed something. */
  TICK = "TICK",
  ERROR = "ERROR",
}
