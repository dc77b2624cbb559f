import { type Logger, type PlayerId } from '@stalked/shared';
import { CapacityExceededError, describeError } from '../errors';
import type { Player, World } from '../game/World';
import type { Connection } from './Connection';

export interface Session {
  id: PlayerId;
  connection: Connection;
  remoteAddress: string;
  connected: boolean;
  lastHeartbeat: number; // ms
}

export type LeaveReason = 'disconnect' | 'timeout' | 'send_failed' | 'error';

export interface RegistryHooks {
  playerJoined: (session: Session, player: Player) => void;
  playerLeft: (id: PlayerId, reason: LeaveReason) => void;
}

export type AcceptResult =
  | { ok: true; session: Session; player: Player }
  | { ok: false; error: CapacityExceededError };

export interface SessionRegistryOptions {
  /** 0 = unlimited */
  capacity: number;
  hooks: RegistryHooks;
  log: Logger;
}

/**
 * Live sessions keyed by numeric id. Ids are the smallest free positive
 * integers, so a freed id is handed out again on the next accept.
 */
export class SessionRegistry {
  private readonly sessions = new Map<PlayerId, Session>();
  private readonly capacity: number;
  private readonly hooks: RegistryHooks;
  private readonly log: Logger;

  constructor(
    private readonly world: World,
    opts: SessionRegistryOptions
  ) {
    this.capacity = opts.capacity;
    this.hooks = opts.hooks;
    this.log = opts.log;
  }

  get size(): number {
    return this.sessions.size;
  }

  isFull(): boolean {
    return this.capacity !== 0 && this.sessions.size >= this.capacity;
  }

  accept(connection: Connection, nowMs: number): AcceptResult {
    if (this.isFull()) {
      return { ok: false, error: new CapacityExceededError(this.capacity) };
    }

    const id = this.nextFreeId();
    const session: Session = {
      id,
      connection,
      remoteAddress: connection.remoteAddress,
      connected: true,
      lastHeartbeat: nowMs
    };
    this.sessions.set(id, session);
    const player = this.world.addPlayer(id);

    this.hooks.playerJoined(session, player);
    return { ok: true, session, player };
  }

  get(id: PlayerId): Session | undefined {
    return this.sessions.get(id);
  }

  /** Copy of the live sessions, safe to iterate while sessions come and go. */
  list(): Session[] {
    return [...this.sessions.values()];
  }

  /** Idempotent. Returns false when the id was already gone. */
  remove(id: PlayerId, reason: LeaveReason = 'disconnect'): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;

    session.connected = false;
    this.sessions.delete(id);
    this.world.removePlayer(id);
    this.closeConnection(session);

    this.hooks.playerLeft(id, reason);
    return true;
  }

  touchHeartbeat(id: PlayerId, nowMs: number): void {
    const session = this.sessions.get(id);
    if (!session) return;
    session.lastHeartbeat = nowMs;
  }

  /** Removes and returns every session idle for longer than thresholdMs. */
  sweepTimeouts(nowMs: number, thresholdMs: number): Session[] {
    const expired = this.list().filter((s) => s.connected && nowMs - s.lastHeartbeat > thresholdMs);
    for (const s of expired) {
      this.remove(s.id, 'timeout');
    }
    return expired;
  }

  /** Shutdown path: closes everything without leave events. */
  closeAll(): void {
    for (const session of this.list()) {
      session.connected = false;
      this.world.removePlayer(session.id);
      this.closeConnection(session);
    }
    this.sessions.clear();
  }

  private closeConnection(session: Session): void {
    try {
      session.connection.close();
    } catch (err) {
      this.log.debug(`Error closing connection for client ${session.id}: ${describeError(err)}`);
    }
  }

  private nextFreeId(): PlayerId {
    let id = 1;
    while (this.sessions.has(id)) id++;
    return id;
  }
}
