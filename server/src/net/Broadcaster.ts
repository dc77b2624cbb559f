import { stringifyMessage, type Logger, type ServerToClientMessage } from '@stalked/shared';
import { ConnectionLostError, describeError, formatError } from '../errors';
import type { Connection } from './Connection';
import type { SessionRegistry } from './SessionRegistry';

export class Broadcaster {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly log: Logger
  ) {}

  /**
   * Sends to every live session. A failed send never stops the pass; the
   * failed sessions are torn down once everyone else has been served.
   */
  broadcast(msg: ServerToClientMessage): void {
    const data = stringifyMessage(msg);
    const failed: ConnectionLostError[] = [];

    for (const session of this.registry.list()) {
      try {
        session.connection.send(data);
      } catch (err) {
        failed.push(new ConnectionLostError(session.id, err));
      }
    }

    for (const err of failed) {
      this.log.info(`Error broadcasting to client ${err.sessionId}: ${formatError(err)}`);
      this.registry.remove(err.sessionId, 'send_failed');
    }
  }

  /** Direct reply. Returns false when the connection could not be written. */
  sendTo(connection: Connection, msg: ServerToClientMessage): boolean {
    try {
      connection.send(stringifyMessage(msg));
      return true;
    } catch (err) {
      this.log.debug(`Error sending ${msg.type} to ${connection.remoteAddress}: ${describeError(err)}`);
      return false;
    }
  }
}
