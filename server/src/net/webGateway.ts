import http from 'node:http';
import express, { type Request, type Response } from 'express';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { MAX_LINE_BYTES, type Difficulty, type GamePhase, type Logger } from '@stalked/shared';
import { describeError, formatError } from '../errors';
import { WsConnection, type AttachConnection } from './Connection';

export interface WebServerInfo {
  description: string;
  max_players: number;
  current_players: number;
  difficulty: Difficulty;
  game_state: GamePhase;
  port: number;
}

export interface WebGatewayOptions {
  host: string;
  port: number;
  attach: AttachConnection;
  info: () => WebServerInfo;
  log: Logger;
}

export function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/** A frame is a complete line even without the trailing newline. */
export function frameToLine(data: RawData): string {
  const text = rawToString(data);
  return text.endsWith('\n') ? text : `${text}\n`;
}

function setCors(res: Response): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Private-Network', 'true');
  res.setHeader('Access-Control-Allow-Methods', 'GET');
}

export function createWebApp(info: () => WebServerInfo): express.Express {
  const app = express();

  // Server-browser ping without taking a player slot.
  app.options('/api/server', (_req: Request, res: Response) => {
    setCors(res);
    res.send('');
  });

  app.get('/api/server', (_req: Request, res: Response) => {
    setCors(res);
    res.json(info());
  });

  return app;
}

/** HTTP info endpoint plus a WebSocket transport feeding the same sessions as TCP. */
export class WebGateway {
  private httpServer: http.Server | null = null;
  private wss: WebSocketServer | null = null;

  constructor(private readonly opts: WebGatewayOptions) {}

  start(): Promise<void> {
    if (this.httpServer) return Promise.resolve();
    const { log } = this.opts;

    const httpServer = http.createServer(createWebApp(this.opts.info));
    const wss = new WebSocketServer({ server: httpServer, maxPayload: MAX_LINE_BYTES });
    this.httpServer = httpServer;
    this.wss = wss;

    wss.on('error', (err: Error) => {
      log.warn(`WebSocket server error: ${err.message}`);
    });

    wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => this.onConnection(ws, req));

    return new Promise((resolve, reject) => {
      const onBindError = (err: NodeJS.ErrnoException): void => {
        if (err.code === 'EADDRINUSE') {
          log.error(`Web port ${this.opts.port} is already in use. Stop the other server or use --web-port <number>.`);
        } else {
          log.error(`Web gateway bind error: ${err.message}`);
        }
        reject(err);
      };
      httpServer.once('error', onBindError);
      httpServer.listen(this.opts.port, this.opts.host, () => {
        httpServer.off('error', onBindError);
        httpServer.on('error', (err: Error) => log.error(`Web gateway error: ${formatError(err)}`));
        log.info(`Web gateway: http://${this.opts.host}:${this.opts.port}/api/server (WebSocket on same port)`);
        resolve();
      });
    });
  }

  /** The HTTP listener while running. */
  get listener(): http.Server | null {
    return this.httpServer;
  }

  /** Bound HTTP port while listening. */
  get boundPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  stop(): void {
    if (this.wss) {
      for (const client of this.wss.clients) client.terminate();
      this.wss.close();
      this.wss = null;
    }
    if (this.httpServer) {
      this.httpServer.close((err) => {
        if (err) this.opts.log.debug(`HTTP close: ${describeError(err)}`);
      });
      this.httpServer = null;
    }
  }

  private onConnection(ws: WebSocket, req: http.IncomingMessage): void {
    const remote = `${req.socket.remoteAddress ?? '?'}:${req.socket.remotePort ?? '?'}`;
    const binding = this.opts.attach(new WsConnection(ws, remote));

    if (!binding) {
      ws.on('error', (err: Error) => this.opts.log.debug(`Rejected websocket error: ${err.message}`));
      return;
    }

    ws.on('message', (data: RawData) => binding.receive(frameToLine(data)));
    ws.on('error', (err: Error) => binding.closed(err));
    ws.on('close', () => binding.closed());
  }
}
