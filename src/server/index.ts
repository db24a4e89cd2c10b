import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import { Server, type IncomingMessage } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer } from 'ws';
import { SERVICE_NAME, SESSION_HEADER } from '../constants.js';
import type { DisplaySize } from '../input/types.js';
import type { MonitorHub } from '../monitor/hub.js';
import type { ActionQueue } from '../queue/action-queue.js';
import type { SessionManager } from '../session/manager.js';
import { setupActionRoutes } from './action-routes.js';
import { MonitorChannel, sessionIdFromUpgrade } from './monitor-channel.js';
import { setupSystemInfoRoute } from './system-info.js';

export { MonitorChannel, sessionIdFromUpgrade, MESSAGE_RECEIVED_ACK, type MonitorSocket } from './monitor-channel.js';
export { statusForResponse, INVALID_SESSION_MESSAGE, SESSION_CONFLICT_MESSAGE } from './action-routes.js';

export const MONITOR_PATH = '/v1/monitor';

export interface ServerConfig {
  port: number;
  queue: ActionQueue;
  sessions: SessionManager;
  monitor: MonitorHub;
  /** Display size reported by the input backend at startup */
  display: DisplaySize;
  // Security: Network binding (default: all interfaces)
  bindAddress?: string;
  // Security: Allowed CORS origins (empty: any origin)
  allowedOrigins?: string[];
}

export class RemoteControlServer {
  readonly app: Hono;
  private server: Server | null = null;
  private wss: WebSocketServer;
  private monitorChannel: MonitorChannel;
  private port: number;
  private sessions: SessionManager;
  private bindAddress: string;
  private allowedOrigins: string[];

  constructor(config: ServerConfig) {
    this.port = config.port;
    this.sessions = config.sessions;
    this.bindAddress = config.bindAddress ?? '0.0.0.0';
    this.allowedOrigins = config.allowedOrigins ?? [];

    // Create Hono app
    this.app = new Hono();

    // CORS configuration - restrict to allowed origins when any are configured
    this.app.use('*', cors({
      origin: (origin) => {
        // Allow requests with no origin (same-origin, curl, etc.)
        if (!origin) return '*';
        if (this.isOriginAllowed(origin)) {
          return origin;
        }
        console.warn(`[CORS] Blocked request from origin: ${origin}`);
        return null;
      },
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', SESSION_HEADER],
    }));

    // WebSocket server for manual upgrade handling
    this.wss = new WebSocketServer({ noServer: true });
    this.monitorChannel = new MonitorChannel(config.monitor);

    this.setupRoutes(config);
  }

  private setupRoutes(config: ServerConfig): void {
    this.app.get('/', (c) => c.text(`${SERVICE_NAME} is running`));

    // Health check
    this.app.get('/health', (c) => {
      return c.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    setupSystemInfoRoute(this.app, config.display);
    setupActionRoutes(this.app, { queue: config.queue, sessions: config.sessions });

    // Reached only by plain HTTP; upgrades are taken off the server before Hono
    this.app.get(MONITOR_PATH, (c) => c.json({ error: 'Expected a WebSocket upgrade' }, 426));
  }

  isOriginAllowed(origin: string): boolean {
    return this.allowedOrigins.length === 0 || this.allowedOrigins.includes(origin);
  }

  async start(): Promise<void> {
    this.wss.on('error', (error) => {
      console.error('[WebSocket] Server error:', error);
    });
    this.monitorChannel.attachToServer(this.wss);

    // Start the server with @hono/node-server
    const nodeServer = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.bindAddress,
    });
    if (!(nodeServer instanceof Server)) {
      throw new Error('Expected an HTTP/1.1 server');
    }
    this.server = nodeServer;

    // Handle HTTP upgrade requests for the monitor stream
    this.server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });

    await new Promise<void>((resolve, reject) => {
      if (nodeServer.listening) {
        resolve();
        return;
      }
      nodeServer.once('listening', () => resolve());
      nodeServer.once('error', reject);
    });

    console.log(`[Server] HTTP server listening on http://${this.bindAddress}:${this.port}`);
    console.log(`[Server] Monitor stream ready on ws://${this.bindAddress}:${this.port}${MONITOR_PATH}`);
    if (this.bindAddress === '127.0.0.1' || this.bindAddress === 'localhost') {
      console.log('[Server] Security: Accepting connections from localhost only');
    } else if (this.bindAddress === '0.0.0.0') {
      console.warn('[Server] Security: Accepting connections from all interfaces - sessions are the only gate');
    }
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const origin = request.headers.origin;
    const pathname = new URL(request.url || '/', 'http://localhost').pathname;

    // Verify origin for security
    if (origin && !this.isOriginAllowed(origin)) {
      console.warn(`[WebSocket] Blocked connection from origin: ${origin} on path: ${pathname}`);
      socket.write('HTTP/1.1 403 Forbidden\r\n\r\n');
      socket.destroy();
      return;
    }

    if (pathname !== MONITOR_PATH) {
      socket.destroy();
      return;
    }

    if (!this.sessions.validateAndTouch(sessionIdFromUpgrade(request.url, request.headers))) {
      console.warn('[WebSocket] Rejected monitor connection: invalid or missing session ID');
      socket.write('HTTP/1.1 401 Unauthorized\r\n\r\n');
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.wss.emit('connection', ws, request);
    });
  }

  async stop(): Promise<void> {
    this.monitorChannel.disconnectAllClients();
    return new Promise((resolve, reject) => {
      this.wss.close(() => {
        if (this.server) {
          this.server.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        } else {
          resolve();
        }
      });
    });
  }
}
