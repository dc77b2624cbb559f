import { WebSocket } from 'ws';
import { MAX_SEND_BUFFER_BYTES, encodeLine } from '@stalked/shared';

export type TransportKind = 'tcp' | 'ws';

/** One client's stream. send() throws when the peer can no longer be written to. */
export interface Connection {
  readonly kind: TransportKind;
  readonly remoteAddress: string;
  send(json: string): void;
  close(): void;
}

/** The parts of a net.Socket a TcpConnection writes through. */
export interface TcpSocket {
  readonly destroyed: boolean;
  readonly writable: boolean;
  readonly writableLength: number;
  readonly remoteAddress?: string;
  readonly remotePort?: number;
  write(data: string): boolean;
  end(): void;
}

/** The parts of a ws WebSocket a WsConnection writes through. */
export interface WsSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export class TcpConnection implements Connection {
  readonly kind = 'tcp';
  readonly remoteAddress: string;

  constructor(
    private readonly socket: TcpSocket,
    private readonly maxBufferedBytes = MAX_SEND_BUFFER_BYTES
  ) {
    this.remoteAddress = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
  }

  send(json: string): void {
    if (this.socket.destroyed || !this.socket.writable) {
      throw new Error('socket is not writable');
    }
    if (this.socket.writableLength > this.maxBufferedBytes) {
      throw new Error(`peer is not reading (${this.socket.writableLength} bytes queued)`);
    }
    this.socket.write(encodeLine(json));
  }

  close(): void {
    if (this.socket.destroyed) return;
    // end() flushes anything queued (e.g. connection_rejected) before FIN.
    this.socket.end();
  }
}

/** Each outbound line travels as one text frame. */
export class WsConnection implements Connection {
  readonly kind = 'ws';

  constructor(
    private readonly ws: WsSocket,
    readonly remoteAddress: string,
    private readonly maxBufferedBytes = MAX_SEND_BUFFER_BYTES
  ) {}

  send(json: string): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new Error('websocket is not open');
    }
    if (this.ws.bufferedAmount > this.maxBufferedBytes) {
      throw new Error(`peer is not reading (${this.ws.bufferedAmount} bytes queued)`);
    }
    this.ws.send(json);
  }

  close(): void {
    if (this.ws.readyState === WebSocket.CLOSED || this.ws.readyState === WebSocket.CLOSING) return;
    this.ws.close(1000, 'session_closed');
  }
}

/** What a transport gets back for an accepted connection. */
export interface ConnectionBinding {
  readonly sessionId: number;
  /** Raw bytes or text from the peer; may hold partial or several lines. */
  receive(chunk: string | Buffer): void;
  /** Peer went away. An error means the link failed rather than closed cleanly. */
  closed(err?: unknown): void;
}

export type AttachConnection = (connection: Connection) => ConnectionBinding | null;
