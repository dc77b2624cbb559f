import {
  type BulletSnapshot,
  type ChaserSnapshot,
  type ClientToServerMessage,
  type GamePhase,
  type NetMessage,
  type PlayerSnapshot,
  type PlayerUpdateData,
  type PowerupSnapshot,
  type PowerupType,
  type ServerAnnounceMessage,
  type ServerToClientMessage
} from './messages';
import { CHARACTER_MAX, PLAYER_MAX_HEALTH, WORLD_HEIGHT, WORLD_WIDTH } from './constants';
import { isDifficulty } from './difficulty';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isString(v: unknown): v is string {
  return typeof v === 'string';
}

function isNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

function isBoolean(v: unknown): v is boolean {
  return typeof v === 'boolean';
}

function isInt(v: unknown): v is number {
  return isNumber(v) && Number.isInteger(v);
}

function isGamePhase(v: unknown): v is GamePhase {
  return v === 1 || v === 2 || v === 3 || v === 4;
}

function isPowerupType(v: unknown): v is PowerupType {
  return v === 'health' || v === 'speed' || v === 'immunity';
}

function clamp(n: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, n));
}

export function safeJsonParse(str: string): unknown | null {
  try {
    return JSON.parse(str);
  } catch {
    return null;
  }
}

export function stringifyMessage(msg: NetMessage<string, object>): string {
  return JSON.stringify(msg);
}

/**
 * Validates a player_update payload field by field.
 * Unknown keys are dropped; so is any key with the wrong type.
 * id, max_health and score are owned by the server and never read here.
 */
export function parsePlayerUpdate(data: Record<string, unknown>, maxHealth: number = PLAYER_MAX_HEALTH): PlayerUpdateData {
  const out: PlayerUpdateData = {};
  if (isNumber(data.x)) out.x = clamp(data.x, 0, WORLD_WIDTH);
  if (isNumber(data.y)) out.y = clamp(data.y, 0, WORLD_HEIGHT);
  if (isNumber(data.angle)) out.angle = data.angle;
  if (isInt(data.health)) out.health = clamp(data.health, 0, maxHealth);
  if (isInt(data.character) && data.character >= 0 && data.character <= CHARACTER_MAX) out.character = data.character;
  if (isBoolean(data.sword_attacking)) out.sword_attacking = data.sword_attacking;
  if (isBoolean(data.speed_boost_active)) out.speed_boost_active = data.speed_boost_active;
  if (isBoolean(data.immunity_boost_active)) out.immunity_boost_active = data.immunity_boost_active;
  return out;
}

/** Takes an already JSON-decoded value. Returns null for anything that is not a known, well-formed message. */
export function parseClientMessage(v: unknown): ClientToServerMessage | null {
  if (!isRecord(v) || !isString(v.type)) return null;

  switch (v.type) {
    case 'player_update': {
      const data = v.data ?? {};
      if (!isRecord(data)) return null;
      return { type: 'player_update', data: parsePlayerUpdate(data) };
    }
    case 'player_action': {
      if (v.action !== 'sword_attack') return null;
      return { type: 'player_action', action: 'sword_attack' };
    }
    case 'heartbeat':
      return { type: 'heartbeat' };
    case 'start_game':
      return { type: 'start_game' };
    case 'set_difficulty': {
      if (!isDifficulty(v.difficulty)) return null;
      return { type: 'set_difficulty', difficulty: v.difficulty };
    }
    case 'info_request':
      return { type: 'info_request' };
    default:
      return null;
  }
}

function parsePlayerSnapshot(p: unknown): PlayerSnapshot | null {
  if (!isRecord(p)) return null;
  if (!isInt(p.id) || !isNumber(p.x) || !isNumber(p.y) || !isNumber(p.angle)) return null;
  if (!isInt(p.health) || !isInt(p.max_health) || !isInt(p.score) || !isInt(p.character)) return null;
  if (!isBoolean(p.sword_attacking) || !isBoolean(p.speed_boost_active) || !isBoolean(p.immunity_boost_active)) return null;
  return {
    id: p.id,
    x: p.x,
    y: p.y,
    angle: p.angle,
    health: p.health,
    max_health: p.max_health,
    score: p.score,
    character: p.character,
    sword_attacking: p.sword_attacking,
    speed_boost_active: p.speed_boost_active,
    immunity_boost_active: p.immunity_boost_active
  };
}

function parseChaserSnapshot(c: unknown): ChaserSnapshot | null {
  if (!isRecord(c)) return null;
  if (!isInt(c.id) || !isNumber(c.x) || !isNumber(c.y) || !isNumber(c.angle)) return null;
  if (!isNumber(c.speed) || !isInt(c.health)) return null;
  return { id: c.id, x: c.x, y: c.y, angle: c.angle, speed: c.speed, health: c.health };
}

function parseBulletSnapshot(b: unknown): BulletSnapshot | null {
  if (!isRecord(b)) return null;
  if (!isNumber(b.x) || !isNumber(b.y) || !isNumber(b.dx) || !isNumber(b.dy)) return null;
  return { x: b.x, y: b.y, dx: b.dx, dy: b.dy };
}

function parsePowerupSnapshot(p: unknown): PowerupSnapshot | null {
  if (!isRecord(p)) return null;
  if (!isPowerupType(p.type) || !isNumber(p.x) || !isNumber(p.y)) return null;
  return { type: p.type, x: p.x, y: p.y };
}

function parseList<T>(v: unknown, parseItem: (item: unknown) => T | null): T[] | null {
  if (!Array.isArray(v)) return null;
  const out: T[] = [];
  for (const item of v) {
    const parsed = parseItem(item);
    if (!parsed) return null;
    out.push(parsed);
  }
  return out;
}

/** Client-side decoder for one server line. */
export function parseServerMessage(raw: string): ServerToClientMessage | null {
  const v = safeJsonParse(raw);
  if (!isRecord(v) || !isString(v.type)) return null;

  switch (v.type) {
    case 'connected': {
      if (!isInt(v.client_id) || !isInt(v.max_players) || !isInt(v.current_players)) return null;
      if (!isGamePhase(v.game_state) || !isString(v.server_description) || !isDifficulty(v.difficulty)) return null;
      return {
        type: 'connected',
        client_id: v.client_id,
        max_players: v.max_players,
        current_players: v.current_players,
        game_state: v.game_state,
        server_description: v.server_description,
        difficulty: v.difficulty
      };
    }
    case 'connection_rejected': {
      if (!isString(v.reason)) return null;
      return { type: 'connection_rejected', reason: v.reason };
    }
    case 'server_info': {
      if (!isString(v.description) || !isInt(v.max_players) || !isDifficulty(v.difficulty)) return null;
      return { type: 'server_info', description: v.description, max_players: v.max_players, difficulty: v.difficulty };
    }
    case 'player_joined': {
      const player = parsePlayerSnapshot(v.player_data);
      if (!isInt(v.player_id) || !player) return null;
      const currentPlayers = isInt(v.current_players) ? v.current_players : 0;
      return { type: 'player_joined', player_id: v.player_id, player_data: player, current_players: currentPlayers };
    }
    case 'player_left': {
      if (!isInt(v.player_id)) return null;
      return { type: 'player_left', player_id: v.player_id };
    }
    case 'player_respawned': {
      const player = parsePlayerSnapshot(v.player_data);
      if (!isInt(v.player_id) || !player) return null;
      return { type: 'player_respawned', player_id: v.player_id, player_data: player };
    }
    case 'game_started': {
      if (!isDifficulty(v.difficulty)) return null;
      return { type: 'game_started', difficulty: v.difficulty };
    }
    case 'difficulty_changed': {
      if (!isDifficulty(v.difficulty)) return null;
      return { type: 'difficulty_changed', difficulty: v.difficulty };
    }
    case 'sword_attack': {
      if (!isInt(v.player_id)) return null;
      return { type: 'sword_attack', player_id: v.player_id };
    }
    case 'game_state': {
      if (!isGamePhase(v.state) || !isNumber(v.game_time) || !isDifficulty(v.difficulty) || !isInt(v.global_score)) {
        return null;
      }
      const players = parseList(v.players, parsePlayerSnapshot);
      const chasers = parseList(v.chasers, parseChaserSnapshot);
      const bullets = parseList(v.bullets, parseBulletSnapshot);
      const powerups = parseList(v.powerups, parsePowerupSnapshot);
      if (!players || !chasers || !bullets || !powerups) return null;
      return {
        type: 'game_state',
        state: v.state,
        players,
        chasers,
        bullets,
        powerups,
        game_time: v.game_time,
        difficulty: v.difficulty,
        global_score: v.global_score
      };
    }
    default:
      return null;
  }
}

export function parseServerAnnounce(raw: string): ServerAnnounceMessage | null {
  const v = safeJsonParse(raw);
  if (!isRecord(v) || v.type !== 'server_announce') return null;

  if (!isString(v.description)) return null;
  if (!isInt(v.max_players) || v.max_players < 0) return null;
  if (!isInt(v.current_players) || v.current_players < 0) return null;
  if (!isDifficulty(v.difficulty)) return null;
  if (!isInt(v.port) || v.port < 1 || v.port > 65535) return null;
  if (!isString(v.host)) return null;

  return {
    type: 'server_announce',
    description: v.description,
    max_players: v.max_players,
    current_players: v.current_players,
    difficulty: v.difficulty,
    port: v.port,
    host: v.host
  };
}
