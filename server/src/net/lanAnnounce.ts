import dgram from 'node:dgram';
import { stringifyMessage, type Logger, type ServerAnnounceFields, type ServerAnnounceMessage } from '@stalked/shared';
import { describeError } from '../errors';

const ANNOUNCE_INTERVAL_MS = 1000;
export const BROADCAST_ADDRESS = '255.255.255.255';

/** Broadcasts server_announce once a second so LAN clients can list the server. */
export class LanAnnouncer {
  private socket: dgram.Socket | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly udpPort: number,
    private readonly info: () => ServerAnnounceFields,
    private readonly log: Logger,
    private readonly address = BROADCAST_ADDRESS
  ) {}

  start(): void {
    if (this.socket) return;
    this.log.info(`UDP discovery enabled (broadcast port ${this.udpPort}).`);

    const socket = dgram.createSocket('udp4');
    socket.on('error', (err) => {
      this.log.warn(`UDP announce error: ${err.message}`);
    });
    socket.bind(() => {
      socket.setBroadcast(true);
    });
    this.socket = socket;

    this.timer = setInterval(() => this.announce(), ANNOUNCE_INTERVAL_MS);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.socket) {
      const socket = this.socket;
      this.socket = null;
      try {
        socket.close();
      } catch (err) {
        this.log.debug(`UDP socket close: ${describeError(err)}`);
      }
    }
  }

  announce(): void {
    if (!this.socket) return;
    const msg: ServerAnnounceMessage = { type: 'server_announce', ...this.info() };
    const buf = Buffer.from(stringifyMessage(msg), 'utf8');
    this.socket.send(buf, 0, buf.length, this.udpPort, this.address, (err) => {
      if (err) this.log.debug(`UDP announce send failed: ${err.message}`);
    });
  }
}
