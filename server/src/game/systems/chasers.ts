import {
  CHASER_SPAWN_ATTEMPTS,
  CHASER_SPAWN_MARGIN,
  CHASER_SPAWN_MIN_CENTER_DIST,
  FIRE_RANGE,
  LIGHT_RADIUS,
  SPAWN_X,
  SPAWN_Y,
  WORLD_HEIGHT,
  WORLD_WIDTH,
  getDifficultySettings,
  type RNG
} from '@stalked/shared';
import type { Chaser, Player, World } from '../World';

export interface NearestPlayer {
  player: Player;
  distance: number;
}

export function findNearestPlayer(players: Iterable<Player>, x: number, y: number): NearestPlayer | null {
  let best: NearestPlayer | null = null;
  for (const p of players) {
    const distance = Math.hypot(p.x - x, p.y - y);
    if (!best || distance < best.distance) best = { player: p, distance };
  }
  return best;
}

/** Nearest player is in the light: the chaser freezes. */
export function isLit(nearest: NearestPlayer): boolean {
  return nearest.distance < LIGHT_RADIUS;
}

export function updateChasers(world: World): void {
  if (world.players.size === 0) return;

  for (const chaser of world.chasers) {
    const nearest = findNearestPlayer(world.players.values(), chaser.x, chaser.y);
    if (!nearest || isLit(nearest)) continue;

    const dx = nearest.player.x - chaser.x;
    const dy = nearest.player.y - chaser.y;
    const distance = Math.hypot(dx, dy);
    if (distance <= 0) continue;

    const ux = dx / distance;
    const uy = dy / distance;
    chaser.x += ux * chaser.speed;
    chaser.y += uy * chaser.speed;
    chaser.angle = (Math.atan2(uy, ux) * 180) / Math.PI;
  }
}

/** One shared volley clock for every chaser. Returns the number of bullets fired. */
export function fireChasers(world: World): number {
  const settings = getDifficultySettings(world.difficulty);
  if (world.gameTime - world.lastBulletTime < settings.bulletInterval) return 0;

  let fired = 0;
  if (world.players.size > 0) {
    for (const chaser of world.chasers) {
      const nearest = findNearestPlayer(world.players.values(), chaser.x, chaser.y);
      if (!nearest || nearest.distance >= FIRE_RANGE || isLit(nearest)) continue;

      const dx = nearest.player.x - chaser.x;
      const dy = nearest.player.y - chaser.y;
      const distance = Math.hypot(dx, dy);
      if (distance <= 0) continue;

      world.bullets.push({
        x: chaser.x,
        y: chaser.y,
        dx: (dx / distance) * settings.bulletSpeed,
        dy: (dy / distance) * settings.bulletSpeed
      });
      fired++;
    }
  }

  world.lastBulletTime = world.gameTime;
  return fired;
}

/** Rejection-sampled point away from the player spawn; falls back to the last sample. */
export function rollChaserSpawn(rng: RNG): { x: number; y: number } {
  let x = SPAWN_X;
  let y = SPAWN_Y;
  for (let attempt = 0; attempt < CHASER_SPAWN_ATTEMPTS; attempt++) {
    x = rng.int(CHASER_SPAWN_MARGIN, WORLD_WIDTH - CHASER_SPAWN_MARGIN);
    y = rng.int(CHASER_SPAWN_MARGIN, WORLD_HEIGHT - CHASER_SPAWN_MARGIN);
    if (Math.hypot(x - SPAWN_X, y - SPAWN_Y) >= CHASER_SPAWN_MIN_CENTER_DIST) break;
  }
  return { x, y };
}

export function createChaser(world: World, id: number, rng: RNG): Chaser {
  const pos = rollChaserSpawn(rng);
  return {
    id,
    x: pos.x,
    y: pos.y,
    angle: 0,
    speed: getDifficultySettings(world.difficulty).chaserSpeed,
    health: 1
  };
}

export function spawnChasers(world: World, rng: RNG): void {
  const { chaserCount } = getDifficultySettings(world.difficulty);
  world.chasers = [];
  for (let id = 0; id < chaserCount; id++) {
    world.chasers.push(createChaser(world, id, rng));
  }
}

/** Brings back every chaser whose respawn time has arrived. Returns their ids. */
export function respawnChasers(world: World, rng: RNG): number[] {
  const respawned: number[] = [];
  for (const [id, due] of world.chaserRespawns) {
    if (world.gameTime < due) continue;
    world.chasers.push(createChaser(world, id, rng));
    respawned.push(id);
  }
  for (const id of respawned) world.chaserRespawns.delete(id);
  return respawned;
}
