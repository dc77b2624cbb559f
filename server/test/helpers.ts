import {
  RNG,
  parseServerMessage,
  type ServerMessageType,
  type ServerToClientMessage
} from '@stalked/shared';
import type { Connection } from '../src/net/Connection';

type MessageOf<T extends ServerMessageType> = Extract<ServerToClientMessage, { type: T }>;

/** In-memory connection that records every line the server sends. */
export class FakeConnection implements Connection {
  readonly kind = 'tcp';
  readonly sent: string[] = [];
  closed = false;
  failSends = false;

  constructor(readonly remoteAddress = '127.0.0.1:40000') {}

  send(json: string): void {
    if (this.failSends || this.closed) throw new Error('broken pipe');
    this.sent.push(json);
  }

  close(): void {
    this.closed = true;
  }

  messages(): ServerToClientMessage[] {
    const out: ServerToClientMessage[] = [];
    for (const line of this.sent) {
      const msg = parseServerMessage(line);
      if (!msg) throw new Error(`unparseable server line: ${line}`);
      out.push(msg);
    }
    return out;
  }

  ofType<T extends ServerMessageType>(type: T): MessageOf<T>[] {
    return this.messages().filter((m): m is MessageOf<T> => m.type === type);
  }

  types(): ServerMessageType[] {
    return this.messages().map((m) => m.type);
  }

  clear(): void {
    this.sent.length = 0;
  }
}

/** Replays the given values, then repeats the last one. */
export function seqRng(values: number[]): RNG {
  let i = 0;
  return new RNG(() => {
    const v = values[i] ?? values[values.length - 1] ?? 0;
    i += 1;
    return v;
  });
}

export function constRng(value: number): RNG {
  return new RNG(() => value);
}

/** Polls until check() holds; rejects after timeoutMs. */
export async function waitUntil(check: () => boolean, what: string, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error(`timed out waiting for ${what}`);
    await new Promise<void>((resolve) => setTimeout(resolve, 10));
  }
}
