/**
 * Spectator Server - WebSocket feed of a running session.
 *
 * Read-only: clients receive a WELCOME snapshot on connect and then every
 * session event as JSON. An HTTP /health endpoint reports status.
 */

import { WebSocketServer, WebSocket } from 'ws';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { GameId, SessionEvent, SessionEventCallback } from '../session/types';
import type { TallyState } from '../session/tally';

/**
 * The parts of a GameSession the feed needs.
 */
export interface SpectatedSession {
  onEvent(callback: SessionEventCallback): () => void;
  getGameId(): GameId | null;
  getTally(): TallyState;
  isRunning(): boolean;
}

export type SpectatorMessage =
  | { type: 'WELCOME'; gameId: GameId | null; running: boolean; tally: TallyState }
  | { type: 'EVENT'; event: SessionEvent };

export class SpectatorServer {
  private session: SpectatedSession;
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private unsubscribe: (() => void) | null = null;

  constructor(session: SpectatedSession) {
    this.session = session;
  }

  private handleHttpRequest(req: IncomingMessage, res: ServerResponse): void {
    const json = (status: number, body: unknown) => {
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(body));
    };

    if (req.url === '/health') {
      json(200, {
        status: 'ok',
        gameId: this.session.getGameId(),
        running: this.session.isRunning(),
        spectators: this.clients.size,
      });
      return;
    }
    json(404, { error: 'Not found' });
  }

  /**
   * Starts listening. Resolves with the bound port (useful with port 0).
   */
  start(port: number, host: string = '127.0.0.1'): Promise<number> {
    this.httpServer = createServer((req, res) => this.handleHttpRequest(req, res));
    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      this.sendToClient(ws, {
        type: 'WELCOME',
        gameId: this.session.getGameId(),
        running: this.session.isRunning(),
        tally: this.session.getTally(),
      });
      ws.on('close', () => {
        this.clients.delete(ws);
      });
    });

    this.unsubscribe = this.session.onEvent((event) => this.broadcast({ type: 'EVENT', event }));

    const server = this.httpServer;
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        const address = server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        console.log(`Spectator feed listening on ws://${host}:${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const client of this.clients) {
      client.terminate();
    }
    this.clients.clear();
    this.wss?.close();
    this.wss = null;

    const server = this.httpServer;
    this.httpServer = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  getClientCount(): number {
    return this.clients.size;
  }

  private broadcast(message: SpectatorMessage): void {
    for (const client of this.clients) {
      this.sendToClient(client, message);
    }
  }

  private sendToClient(ws: WebSocket, message: SpectatorMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }
}
