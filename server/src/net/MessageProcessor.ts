import {
  GamePhase,
  parseClientMessage,
  safeJsonParse,
  type ClientToServerMessage,
  type Difficulty,
  type Logger,
  type PlayerId,
  type ServerInfoFields
} from '@stalked/shared';
import { ProtocolError, formatError } from '../errors';
import type { World } from '../game/World';
import type { Broadcaster } from './Broadcaster';
import type { Connection } from './Connection';
import type { SessionRegistry } from './SessionRegistry';

/** The parts of the server a client message may drive. */
export interface GameControl {
  startGame(): void;
  setDifficulty(difficulty: Difficulty): void;
  serverInfo(): ServerInfoFields;
}

export interface MessageProcessorDeps {
  world: World;
  registry: SessionRegistry;
  broadcaster: Broadcaster;
  control: GameControl;
  clock: () => number;
  log: Logger;
}

export class MessageProcessor {
  constructor(private readonly deps: MessageProcessorDeps) {}

  /** One raw line from a client. Non-JSON is logged and dropped; the connection stays up. */
  handleLine(sessionId: PlayerId, connection: Connection, line: string): void {
    const value = safeJsonParse(line);
    if (value === null) {
      this.deps.log.info(formatError(new ProtocolError(`Invalid JSON from client ${sessionId}`, line)));
      return;
    }

    const msg = parseClientMessage(value);
    if (!msg) {
      this.deps.log.debug(`Ignored message from client ${sessionId}`, line.slice(0, 200));
      return;
    }

    this.handleMessage(sessionId, connection, msg);
  }

  handleMessage(sessionId: PlayerId, connection: Connection, msg: ClientToServerMessage): void {
    const { world, registry, broadcaster, control, clock } = this.deps;

    // Any well-formed message proves the client is alive.
    registry.touchHeartbeat(sessionId, clock());

    switch (msg.type) {
      case 'player_update': {
        world.applyPlayerUpdate(sessionId, msg.data);
        return;
      }
      case 'player_action': {
        const player = world.getPlayer(sessionId);
        if (!player) return;
        player.swordAttacking = true;
        broadcaster.broadcast({ type: 'sword_attack', player_id: sessionId });
        return;
      }
      case 'heartbeat':
        return;
      case 'start_game': {
        if (world.phase === GamePhase.MENU) control.startGame();
        return;
      }
      case 'set_difficulty': {
        control.setDifficulty(msg.difficulty);
        return;
      }
      case 'info_request': {
        broadcaster.sendTo(connection, { type: 'server_info', ...control.serverInfo() });
        return;
      }
    }
  }
}
