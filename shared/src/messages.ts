export type PlayerId = number;

export const GamePhase = {
  MENU: 1,
  PLAYING: 2,
  PAUSED: 3,
  GAME_OVER: 4
} as const;
export type GamePhase = (typeof GamePhase)[keyof typeof GamePhase];

export const Difficulty = {
  EASY: 1,
  MEDIUM: 2,
  HARD: 3
} as const;
export type Difficulty = (typeof Difficulty)[keyof typeof Difficulty];
export type DifficultyName = keyof typeof Difficulty;

export type PowerupType = 'health' | 'speed' | 'immunity';
export const POWERUP_TYPES: readonly PowerupType[] = ['health', 'speed', 'immunity'];

// Messages are flat on the wire: { "type": "...", ...fields }
export type NetMessage<TType extends string, TFields extends object = {}> = { type: TType } & TFields;

// -------------------------
// Client -> Server
// -------------------------

export interface PlayerUpdateData {
  x?: number;
  y?: number;
  angle?: number;
  health?: number;
  character?: number;
  sword_attacking?: boolean;
  speed_boost_active?: boolean;
  immunity_boost_active?: boolean;
}

export type PlayerAction = 'sword_attack';

export type ClientToServerMessage =
  | NetMessage<'player_update', { data: PlayerUpdateData }>
  | NetMessage<'player_action', { action: PlayerAction }>
  | NetMessage<'heartbeat'>
  | NetMessage<'start_game'>
  | NetMessage<'set_difficulty', { difficulty: Difficulty }>
  | NetMessage<'info_request'>;

// -------------------------
// Server -> Client
// -------------------------

export interface PlayerSnapshot {
  id: PlayerId;
  x: number;
  y: number;
  angle: number;
  health: number;
  max_health: number;
  score: number;
  character: number;
  sword_attacking: boolean;
  speed_boost_active: boolean;
  immunity_boost_active: boolean;
}

export interface ChaserSnapshot {
  id: number;
  x: number;
  y: number;
  angle: number;
  speed: number;
  health: number;
}

export interface BulletSnapshot {
  x: number;
  y: number;
  dx: number;
  dy: number;
}

export interface PowerupSnapshot {
  type: PowerupType;
  x: number;
  y: number;
}

export interface ConnectedFields {
  client_id: PlayerId;
  max_players: number;
  current_players: number;
  game_state: GamePhase;
  server_description: string;
  difficulty: Difficulty;
}

export interface ServerInfoFields {
  description: string;
  max_players: number;
  difficulty: Difficulty;
}

export interface GameStateFields {
  state: GamePhase;
  players: PlayerSnapshot[];
  chasers: ChaserSnapshot[];
  bullets: BulletSnapshot[];
  powerups: PowerupSnapshot[];
  game_time: number;
  difficulty: Difficulty;
  global_score: number;
}

export type ServerToClientMessage =
  | NetMessage<'connected', ConnectedFields>
  | NetMessage<'connection_rejected', { reason: string }>
  | NetMessage<'server_info', ServerInfoFields>
  | NetMessage<'player_joined', { player_id: PlayerId; player_data: PlayerSnapshot; current_players: number }>
  | NetMessage<'player_left', { player_id: PlayerId }>
  | NetMessage<'player_respawned', { player_id: PlayerId; player_data: PlayerSnapshot }>
  | NetMessage<'game_started', { difficulty: Difficulty }>
  | NetMessage<'difficulty_changed', { difficulty: Difficulty }>
  | NetMessage<'sword_attack', { player_id: PlayerId }>
  | NetMessage<'game_state', GameStateFields>;

export type ServerMessageType = ServerToClientMessage['type'];

// -------------------------
// UDP Discovery (optional)
// -------------------------
export interface ServerAnnounceFields {
  description: string;
  max_players: number;
  current_players: number;
  difficulty: Difficulty;
  port: number;
  host: string;
}

export type ServerAnnounceMessage = NetMessage<'server_announce', ServerAnnounceFields>;
