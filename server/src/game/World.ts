import {
  Difficulty,
  GamePhase,
  PLAYER_MAX_HEALTH,
  SPAWN_X,
  SPAWN_Y,
  type PlayerId,
  type PlayerUpdateData,
  type PowerupType
} from '@stalked/shared';

export interface Player {
  id: PlayerId;
  x: number;
  y: number;
  angle: number; // degrees
  health: number;
  maxHealth: number;
  score: number;
  character: number;
  swordAttacking: boolean;
  speedBoostActive: boolean;
  immunityBoostActive: boolean;
  lastScoreTime: number; // game seconds
}

export interface Chaser {
  id: number;
  x: number;
  y: number;
  angle: number;
  speed: number;
  health: number;
}

export interface Bullet {
  x: number;
  y: number;
  dx: number; // per tick
  dy: number;
}

export interface Powerup {
  type: PowerupType;
  x: number;
  y: number;
}

/**
 * The shared world aggregate. Only StalkedServer (and the systems it
 * runs) mutates it, always from the event loop.
 */
export class World {
  phase: GamePhase = GamePhase.MENU;
  difficulty: Difficulty;

  gameTime = 0; // game seconds since start
  globalScore = 0;
  lastGlobalScoreTime = 0;
  lastBulletTime = 0;

  readonly players = new Map<PlayerId, Player>();
  chasers: Chaser[] = [];
  bullets: Bullet[] = [];
  powerups: Powerup[] = [];

  /** chaser id -> game time it comes back */
  readonly chaserRespawns = new Map<number, number>();
  /** player id -> wall clock ms of last damage */
  readonly damageCooldowns = new Map<PlayerId, number>();

  constructor(difficulty: Difficulty = Difficulty.MEDIUM) {
    this.difficulty = difficulty;
  }

  get isPlaying(): boolean {
    return this.phase === GamePhase.PLAYING;
  }

  addPlayer(id: PlayerId): Player {
    const player: Player = {
      id,
      x: SPAWN_X,
      y: SPAWN_Y,
      angle: 0,
      health: PLAYER_MAX_HEALTH,
      maxHealth: PLAYER_MAX_HEALTH,
      score: 0,
      character: 0,
      swordAttacking: false,
      speedBoostActive: false,
      immunityBoostActive: false,
      lastScoreTime: this.gameTime
    };
    this.players.set(id, player);
    return player;
  }

  getPlayer(id: PlayerId): Player | undefined {
    return this.players.get(id);
  }

  removePlayer(id: PlayerId): boolean {
    this.damageCooldowns.delete(id);
    return this.players.delete(id);
  }

  applyPlayerUpdate(id: PlayerId, data: PlayerUpdateData): boolean {
    const p = this.players.get(id);
    if (!p) return false;

    if (data.x !== undefined) p.x = data.x;
    if (data.y !== undefined) p.y = data.y;
    if (data.angle !== undefined) p.angle = data.angle;
    if (data.health !== undefined) p.health = Math.min(data.health, p.maxHealth);
    if (data.character !== undefined) p.character = data.character;
    if (data.sword_attacking !== undefined) p.swordAttacking = data.sword_attacking;
    if (data.speed_boost_active !== undefined) p.speedBoostActive = data.speed_boost_active;
    if (data.immunity_boost_active !== undefined) p.immunityBoostActive = data.immunity_boost_active;
    return true;
  }

  respawnPlayer(p: Player): void {
    p.x = SPAWN_X;
    p.y = SPAWN_Y;
    p.health = p.maxHealth;
  }

  /** Everything except the chaser set, which needs the spawn RNG. */
  resetForNewGame(): void {
    this.phase = GamePhase.PLAYING;
    this.gameTime = 0;
    this.damageCooldowns.clear();
    this.chaserRespawns.clear();
    this.globalScore = 0;
    this.lastGlobalScoreTime = 0;
    this.lastBulletTime = 0;
    this.bullets = [];
    this.powerups = [];

    for (const p of this.players.values()) {
      p.x = SPAWN_X;
      p.y = SPAWN_Y;
      p.health = p.maxHealth;
      p.score = 0;
      p.swordAttacking = false;
      p.lastScoreTime = 0;
    }
  }
}
