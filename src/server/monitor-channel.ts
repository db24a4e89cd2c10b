/**
 * Monitor Channel
 *
 * Streams MonitorHub events to WebSocket clients, one JSON text frame per
 * event in publish order. Each client owns its own hub subscription, which
 * is closed when the socket goes away. The next event is read only after the
 * previous frame has been written, so a slow client's backlog stays in its
 * bounded subscription buffer.
 */

import type { EventEmitter } from 'events';
import type { IncomingHttpHeaders } from 'http';
import { WebSocket, type WebSocketServer } from 'ws';
import { v4 as uuid } from 'uuid';
import { SESSION_HEADER } from '../constants.js';
import { errorMessage } from '../actions/errors.js';
import type { MonitorHub, MonitorSubscription } from '../monitor/hub.js';

export const MESSAGE_RECEIVED_ACK = JSON.stringify({ status: 'message_received' });

/**
 * The part of a ws WebSocket the channel uses.
 */
export interface MonitorSocket extends Pick<EventEmitter, 'on'> {
  readonly readyState: number;
  send(data: string, callback?: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

interface MonitorClient {
  id: string;
  socket: MonitorSocket;
  subscription: MonitorSubscription;
  connectedAt: Date;
}

/**
 * Session id of an upgrade request: the X-Session-ID header, or the
 * `session_id` query parameter for browsers, which cannot set headers on a
 * WebSocket.
 */
export function sessionIdFromUpgrade(url: string | undefined, headers: IncomingHttpHeaders): string | undefined {
  const header = headers[SESSION_HEADER.toLowerCase()];
  const fromHeader = Array.isArray(header) ? header[0] : header;
  if (fromHeader) return fromHeader;

  const query = new URL(url ?? '/', 'http://localhost').searchParams.get('session_id');
  return query ?? undefined;
}

export class MonitorChannel {
  private clients: Map<string, MonitorClient> = new Map();

  constructor(private readonly hub: MonitorHub) {}

  attachToServer(wss: WebSocketServer): void {
    wss.on('connection', (ws: WebSocket) => {
      this.addClient(ws);
    });
  }

  /**
   * Subscribe a connected socket to the hub. Returns the client id.
   */
  addClient(socket: MonitorSocket): string {
    const clientId = uuid();
    const client: MonitorClient = {
      id: clientId,
      socket,
      subscription: this.hub.subscribe(),
      connectedAt: new Date(),
    };
    this.clients.set(clientId, client);
    console.log(`[Monitor] Client connected (${clientId}), ${this.clients.size} total`);

    socket.on('message', (_data: unknown, isBinary: unknown) => {
      if (isBinary === true) return;
      this.sendRaw(client, MESSAGE_RECEIVED_ACK);
    });

    socket.on('close', () => {
      this.removeClient(clientId);
    });

    socket.on('error', (error: unknown) => {
      console.error(`[Monitor] Client error (${clientId}):`, error);
      this.removeClient(clientId);
    });

    this.pump(client).catch((error: unknown) => {
      console.error(`[Monitor] Event stream for ${clientId} failed:`, error);
      this.removeClient(clientId);
    });

    return clientId;
  }

  clientCount(): number {
    return this.clients.size;
  }

  /**
   * Disconnect all clients without stopping the server.
   */
  disconnectAllClients(): void {
    for (const client of [...this.clients.values()]) {
      client.socket.close(1001, 'Server shutting down');
      this.removeClient(client.id);
    }
  }

  private async pump(client: MonitorClient): Promise<void> {
    for await (const event of client.subscription) {
      if (!(await this.deliver(client, JSON.stringify(event)))) break;
    }
  }

  /**
   * Send one frame and wait until the socket has written it.
   */
  private deliver(client: MonitorClient, data: string): Promise<boolean> {
    if (!this.isOpen(client)) return Promise.resolve(false);
    return new Promise((resolve) => {
      try {
        client.socket.send(data, (error) => {
          if (error) {
            console.warn(`[Monitor] Failed to send to client ${client.id}:`, error.message);
            this.removeClient(client.id);
            resolve(false);
          } else {
            resolve(true);
          }
        });
      } catch (error) {
        // Socket may have been closed between readyState check and send
        console.warn(`[Monitor] Failed to send to client ${client.id}:`, errorMessage(error));
        this.removeClient(client.id);
        resolve(false);
      }
    });
  }

  private sendRaw(client: MonitorClient, data: string): void {
    if (!this.isOpen(client)) return;
    try {
      client.socket.send(data);
    } catch (error) {
      console.warn(`[Monitor] Failed to send to client ${client.id}:`, errorMessage(error));
      this.removeClient(client.id);
    }
  }

  private isOpen(client: MonitorClient): boolean {
    if (client.socket.readyState !== WebSocket.OPEN) {
      this.removeClient(client.id);
      return false;
    }
    return true;
  }

  private removeClient(clientId: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;
    this.clients.delete(clientId);
    client.subscription.close();
    if (client.subscription.dropped > 0) {
      console.warn(`[Monitor] Client ${clientId} fell behind and missed ${client.subscription.dropped} events`);
    }
    console.log(`[Monitor] Client disconnected (${clientId}), ${this.clients.size} remaining`);
  }
}
