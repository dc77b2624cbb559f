import net from 'node:net';
import {
  AUTO_START_DELAY_MS,
  Difficulty,
  GamePhase,
  HEARTBEAT_TIMEOUT_MS,
  LineDecoder,
  RNG,
  SNAPSHOT_MS,
  TICK_MS,
  createLogger,
  difficultyName,
  type LogLevel,
  type Logger,
  type PlayerId,
  type ServerAnnounceFields,
  type ServerInfoFields
} from '@stalked/shared';
import { ConnectionLostError, ProtocolError, SessionTimeoutError, describeError, formatError } from '../errors';
import { Broadcaster } from '../net/Broadcaster';
import { TcpConnection, type Connection, type ConnectionBinding } from '../net/Connection';
import { LanAnnouncer } from '../net/lanAnnounce';
import { MessageProcessor, type GameControl } from '../net/MessageProcessor';
import { SessionRegistry, type LeaveReason, type Session } from '../net/SessionRegistry';
import { WebGateway, type WebServerInfo } from '../net/webGateway';
import { Simulation } from './Simulation';
import { buildGameState, toPlayerSnapshot } from './snapshot';
import { World, type Player } from './World';

export interface ServerOptions {
  host: string;
  port: number;
  /** 0 = unlimited (partnership mode) */
  maxPlayers: number;
  description: string;
  difficulty: Difficulty;
  /** 0 disables the HTTP/WebSocket gateway */
  webPort: number;
  udp: boolean;
  udpPort: number;
  logLevel: LogLevel;

  log?: Logger;
  clock?: () => number;
  rng?: RNG;
  heartbeatTimeoutMs?: number;
  autoStartDelayMs?: number;
}

export class StalkedServer implements GameControl {
  private readonly opts: ServerOptions;
  private readonly log: Logger;
  private readonly clock: () => number;
  private readonly heartbeatTimeoutMs: number;

  readonly world: World;
  readonly registry: SessionRegistry;
  private readonly broadcaster: Broadcaster;
  private readonly processor: MessageProcessor;
  private readonly simulation: Simulation;

  private tcpServer: net.Server | null = null;
  private gateway: WebGateway | null = null;
  private announcer: LanAnnouncer | null = null;

  private tickTimer: NodeJS.Timeout | null = null;
  private snapshotTimer: NodeJS.Timeout | null = null;
  private autoStartTimer: NodeJS.Timeout | null = null;
  private autoStarted = false;

  constructor(opts: ServerOptions) {
    this.opts = opts;
    this.log = opts.log ?? createLogger('server', opts.logLevel);
    this.clock = opts.clock ?? Date.now;
    this.heartbeatTimeoutMs = opts.heartbeatTimeoutMs ?? HEARTBEAT_TIMEOUT_MS;

    this.world = new World(opts.difficulty);
    this.registry = new SessionRegistry(this.world, {
      capacity: opts.maxPlayers,
      log: this.log,
      hooks: {
        playerJoined: (session, player) => this.onPlayerJoined(session, player),
        playerLeft: (id, reason) => this.onPlayerLeft(id, reason)
      }
    });
    this.broadcaster = new Broadcaster(this.registry, this.log);
    this.simulation = new Simulation(this.world, opts.rng ?? new RNG(), {
      playerRespawned: (p) => this.onPlayerRespawned(p),
      chaserKilled: (hit) => this.log.debug(`Client ${hit.playerId} slashed chaser ${hit.chaserId}`)
    });
    this.processor = new MessageProcessor({
      world: this.world,
      registry: this.registry,
      broadcaster: this.broadcaster,
      control: this,
      clock: this.clock,
      log: this.log
    });
  }

  get running(): boolean {
    return this.tcpServer !== null;
  }

  /** The TCP listener while running. */
  get listener(): net.Server | null {
    return this.tcpServer;
  }

  /** Bound TCP port, which differs from the configured one when that was 0. */
  get boundPort(): number | null {
    const address = this.tcpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  start(): Promise<void> {
    if (this.tcpServer) return Promise.resolve();

    this.log.info(`Starting TCP server on ${this.opts.host}:${this.opts.port}...`);
    this.log.info(`Description: ${this.opts.description}`);
    this.log.info(
      this.opts.maxPlayers === 0 ? 'Maximum players: Unlimited (Partnership mode)' : `Maximum players: ${this.opts.maxPlayers}`
    );
    this.log.info(`Difficulty: ${difficultyName(this.world.difficulty)}`);

    const tcpServer = net.createServer((socket) => this.onTcpSocket(socket));
    this.tcpServer = tcpServer;

    return new Promise<void>((resolve, reject) => {
      const onBindError = (err: NodeJS.ErrnoException): void => {
        if (err.code === 'EADDRINUSE') {
          this.log.error(`Port ${this.opts.port} is already in use. Stop the other server or use --port <number>.`);
        } else {
          this.log.error(`Server bind error: ${err.message}`);
        }
        this.stop();
        reject(err);
      };
      tcpServer.once('error', onBindError);

      tcpServer.listen(this.opts.port, this.opts.host, () => {
        // Once listening, server errors are logged and never stop the game.
        tcpServer.off('error', onBindError);
        tcpServer.on('error', (err: Error) => this.log.error(`TCP server error: ${formatError(err)}`));
        this.startLoops();

        if (this.opts.udp) {
          this.announcer = new LanAnnouncer(this.opts.udpPort, () => this.announceInfo(), this.log);
          this.announcer.start();
        }

        this.log.info('Server started.');
        this.log.info(`Players can connect to: ${this.opts.host}:${this.opts.port}`);

        if (this.opts.webPort > 0) {
          this.gateway = new WebGateway({
            host: this.opts.host,
            port: this.opts.webPort,
            attach: (conn) => this.attach(conn),
            info: () => this.webInfo(),
            log: this.log
          });
          this.gateway.start().then(resolve, (err: unknown) => {
            this.stop();
            reject(err);
          });
          return;
        }
        resolve();
      });
    });
  }

  /** Safe to call more than once and with sessions already gone. */
  stop(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    if (this.snapshotTimer) {
      clearInterval(this.snapshotTimer);
      this.snapshotTimer = null;
    }
    if (this.autoStartTimer) {
      clearTimeout(this.autoStartTimer);
      this.autoStartTimer = null;
    }
    this.announcer?.stop();
    this.announcer = null;
    this.gateway?.stop();
    this.gateway = null;

    this.registry.closeAll();

    if (this.tcpServer) {
      const tcpServer = this.tcpServer;
      this.tcpServer = null;
      tcpServer.close((err) => {
        if (err) this.log.debug(`TCP close: ${describeError(err)}`);
      });
      this.log.info('Server stopped');
    }
  }

  startLoops(): void {
    if (this.tickTimer) return;
    this.tickTimer = setInterval(() => this.step(), TICK_MS);
    this.snapshotTimer = setInterval(() => this.publishSnapshot(), SNAPSHOT_MS);

    const delay = this.opts.autoStartDelayMs ?? AUTO_START_DELAY_MS;
    this.autoStartTimer = setTimeout(() => {
      this.autoStartTimer = null;
      this.autoStart();
    }, delay);
  }

  /**
   * Admits a connection from any transport. Returns null when the server is
   * full; the client has then been told and the connection closed.
   */
  attach(connection: Connection): ConnectionBinding | null {
    const result = this.registry.accept(connection, this.clock());
    if (!result.ok) {
      this.broadcaster.sendTo(connection, { type: 'connection_rejected', reason: 'Server is full' });
      connection.close();
      this.log.info(`Rejected ${connection.remoteAddress}: ${result.error.message}`);
      return null;
    }

    const id = result.session.id;
    const decoder = new LineDecoder({
      onOverflow: (dropped) => {
        this.log.info(formatError(new ProtocolError(`Line from client ${id} exceeded limit (${dropped} chars dropped)`)));
      }
    });
    // Ids are reused, so a stale binding must not act on a newer session with the same id.
    const isCurrent = (): boolean => this.registry.get(id)?.connection === connection;

    return {
      sessionId: id,
      receive: (chunk) => {
        for (const line of decoder.push(chunk)) {
          if (!isCurrent()) return;
          this.processor.handleLine(id, connection, line);
        }
      },
      closed: (err) => {
        if (!isCurrent()) return;
        if (err !== undefined) {
          this.log.info(`Error handling client ${id}: ${formatError(new ConnectionLostError(id, err))}`);
        }
        this.registry.remove(id, err === undefined ? 'disconnect' : 'error');
      }
    };
  }

  /** One simulation tick: timeout housekeeping, then the game rules. */
  step(): void {
    const now = this.clock();

    for (const session of this.registry.sweepTimeouts(now, this.heartbeatTimeoutMs)) {
      this.log.info(formatError(new SessionTimeoutError(session.id, now - session.lastHeartbeat)));
    }

    this.simulation.tick(now);
  }

  publishSnapshot(): void {
    if (this.registry.size === 0) return;
    this.broadcaster.broadcast({ type: 'game_state', ...buildGameState(this.world) });
  }

  startGame(): void {
    this.autoStarted = true;
    this.simulation.startGame();
    this.log.info(
      `Game started: difficulty=${difficultyName(this.world.difficulty)} chasers=${this.world.chasers.length} players=${this.registry.size}`
    );
    this.broadcaster.broadcast({ type: 'game_started', difficulty: this.world.difficulty });
  }

  /** The one-shot liveness start; a manual start_game beats it. */
  autoStart(): boolean {
    if (this.autoStarted || this.world.phase !== GamePhase.MENU) return false;
    this.log.info('Auto-starting game...');
    this.startGame();
    return true;
  }

  setDifficulty(difficulty: Difficulty): void {
    this.world.difficulty = difficulty;
    this.log.info(`Difficulty set to ${difficultyName(difficulty)}`);
    this.broadcaster.broadcast({ type: 'difficulty_changed', difficulty });
  }

  serverInfo(): ServerInfoFields {
    return {
      description: this.opts.description,
      max_players: this.opts.maxPlayers,
      difficulty: this.world.difficulty
    };
  }

  private webInfo(): WebServerInfo {
    return {
      ...this.serverInfo(),
      current_players: this.registry.size,
      game_state: this.world.phase,
      port: this.opts.port
    };
  }

  private announceInfo(): ServerAnnounceFields {
    return {
      ...this.serverInfo(),
      current_players: this.registry.size,
      port: this.opts.port,
      host: this.opts.host
    };
  }

  private occupancy(): string {
    const n = this.registry.size;
    return this.opts.maxPlayers === 0 ? `${n} (Unlimited)` : `${n}/${this.opts.maxPlayers}`;
  }

  private onTcpSocket(socket: net.Socket): void {
    socket.setNoDelay(true);
    let binding: ConnectionBinding | null = null;

    // Registered before attach so a rejected socket's errors are still handled.
    socket.on('error', (err: Error) => {
      if (binding) binding.closed(err);
      else this.log.debug(`Socket error before session: ${err.message}`);
    });

    binding = this.attach(new TcpConnection(socket));
    if (!binding) return;

    const bound = binding;
    socket.on('data', (chunk: Buffer) => bound.receive(chunk));
    socket.on('close', () => bound.closed());
  }

  private onPlayerJoined(session: Session, player: Player): void {
    this.broadcaster.sendTo(session.connection, {
      type: 'connected',
      client_id: session.id,
      max_players: this.opts.maxPlayers,
      current_players: this.registry.size,
      game_state: this.world.phase,
      server_description: this.opts.description,
      difficulty: this.world.difficulty
    });
    this.broadcaster.broadcast({
      type: 'player_joined',
      player_id: session.id,
      player_data: toPlayerSnapshot(player),
      current_players: this.registry.size
    });

    this.log.info(`Client ${session.id} connected from ${session.remoteAddress} (${session.connection.kind})`);
    this.log.info(`Players online: ${this.occupancy()}`);
  }

  private onPlayerLeft(id: PlayerId, reason: LeaveReason): void {
    this.broadcaster.broadcast({ type: 'player_left', player_id: id });
    this.log.info(`Client ${id} disconnected (${reason})`);
    this.log.info(`Players online: ${this.occupancy()}`);
  }

  private onPlayerRespawned(p: Player): void {
    this.log.debug(`Client ${p.id} died and respawned`);
    this.broadcaster.broadcast({ type: 'player_respawned', player_id: p.id, player_data: toPlayerSnapshot(p) });
  }
}
