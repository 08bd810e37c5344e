/**
 * Connection Registry
 *
 * Tracks open WebSocket connections. Progress, task and notification
 * updates go to every connected client.
 */

import type { ServerMessage } from "./protocol.js";

const OPEN = 1;

/**
 * The part of a WebSocket the registry uses
 */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
}

export class ConnectionRegistry {
  private sockets = new Set<ClientSocket>();

  /**
   * Add a socket to the registry
   */
  add(socket: ClientSocket): void {
    this.sockets.add(socket);
  }

  /**
   * Remove a socket from the registry
   */
  remove(socket: ClientSocket): void {
    this.sockets.delete(socket);
  }

  get size(): number {
    return this.sockets.size;
  }

  /**
   * Send a message to one socket if it is still open
   */
  send(socket: ClientSocket, message: ServerMessage): void {
    if (socket.readyState === OPEN) {
      socket.send(JSON.stringify(message));
    }
  }

  /**
   * Broadcast a message to all connected sockets. Returns how many received it.
   */
  broadcastToAll(message: ServerMessage, exclude?: ClientSocket): number {
    const payload = JSON.stringify(message);
    let sent = 0;

    for (const socket of this.sockets) {
      if (socket !== exclude && socket.readyState === OPEN) {
        socket.send(payload);
        sent++;
      }
    }
    return sent;
  }
}
