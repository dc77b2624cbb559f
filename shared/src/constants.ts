export const TICK_RATE = 60; // 60Hz simulation
export const SNAPSHOT_RATE = 30; // 30Hz game_state broadcast
export const TICK_MS = 1000 / TICK_RATE;
export const SNAPSHOT_MS = 1000 / SNAPSHOT_RATE;

export const DEFAULT_PORT = 5555;
export const DEFAULT_UDP_ANNOUNCE_PORT = 41235;
export const DEFAULT_MAX_PLAYERS = 4;
export const MAX_PLAYERS_CAP = 4; // 0 = unlimited (partnership mode)
export const DEFAULT_DESCRIPTION = 'Stalked Game Server';

export const WORLD_WIDTH = 800;
export const WORLD_HEIGHT = 600;
export const SPAWN_X = 400;
export const SPAWN_Y = 300;

export const PLAYER_MAX_HEALTH = 6;
export const CHARACTER_MAX = 31;

export const LIGHT_RADIUS = 128;
export const FIRE_RANGE = 400;
export const BULLET_HIT_RADIUS = 20;
export const SWORD_RADIUS = 80;

export const DAMAGE_COOLDOWN_MS = 1000; // wall clock
export const CHASER_RESPAWN_DELAY = 2.0; // game seconds

export const CHASER_SPAWN_MARGIN = 100;
export const CHASER_SPAWN_MIN_CENTER_DIST = 200;
export const CHASER_SPAWN_ATTEMPTS = 50;

export const POWERUP_SPAWN_CHANCE = 0.001; // per tick
export const POWERUP_MARGIN = 50;

export const SCORE_INTERVAL = 10; // game seconds
export const SWORD_KILL_SCORE = 5;

export const HEARTBEAT_TIMEOUT_MS = 60_000;
export const AUTO_START_DELAY_MS = 3000;

export const MAX_LINE_BYTES = 64 * 1024;
// Outbound bytes a peer may leave unread before it is dropped.
export const MAX_SEND_BUFFER_BYTES = 1024 * 1024;
