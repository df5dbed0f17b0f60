/**
 * WebSocket Utilities
 *
 * Send helpers shared by the renderer bridge.
 */

import { WebSocket } from 'ws';
import type { ServerMessage } from './types.js';

/**
 * Send a message to a renderer if its connection is still open.
 */
export function sendWsMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

/**
 * Send one message to every open renderer. Serializes once.
 */
export function broadcastWsMessage(clients: Iterable<WebSocket>, message: ServerMessage): number {
  const payload = JSON.stringify(message);
  let sent = 0;
  for (const ws of clients) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(payload);
      sent++;
    }
  }
  return sent;
}
