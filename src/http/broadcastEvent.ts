import { connection as WebSocketConnection } from 'websocket';
import logger from '../utils/logger';
import type { LibraryEvent } from '../backend/events/eventNotifier';

/** Every websocket client currently connected. */
export const wsConnections = new Set<WebSocketConnection>();

export function addWebSocketConnection(connection: WebSocketConnection): void {
  wsConnections.add(connection);
}

export function removeWebSocketConnection(connection: WebSocketConnection): void {
  wsConnections.delete(connection);
}

/**
 * Pushes a library event to every connected client as `{ event, uri, data }`.
 */
export function broadcastEvent(event: LibraryEvent): void {
  if (wsConnections.size === 0) return;
  const message = JSON.stringify(event);
  wsConnections.forEach((connection) => {
    if (!connection.connected) return;
    try {
      connection.sendUTF(message);
    } catch (error) {
      logger.warn(`[Broadcast] Failed to send ${event.event} to ${connection.remoteAddress}: ${error}`);
    }
  });
}
