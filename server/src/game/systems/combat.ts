import {
  BULLET_HIT_RADIUS,
  CHASER_RESPAWN_DELAY,
  DAMAGE_COOLDOWN_MS,
  SWORD_KILL_SCORE,
  SWORD_RADIUS,
  WORLD_HEIGHT,
  WORLD_WIDTH
} from '@stalked/shared';
import type { Player, World } from '../World';

export interface CombatContext {
  world: World;
  nowMs: number; // wall clock, drives damage cooldowns
  onPlayerRespawned: (player: Player) => void;
}

export interface SwordHit {
  playerId: number;
  chaserId: number;
}

export function moveBullets(world: World): void {
  world.bullets = world.bullets.filter((b) => {
    b.x += b.dx;
    b.y += b.dy;
    return b.x >= 0 && b.x <= WORLD_WIDTH && b.y >= 0 && b.y <= WORLD_HEIGHT;
  });
}

function canTakeDamage(ctx: CombatContext, p: Player): boolean {
  if (p.immunityBoostActive) return false;
  const last = ctx.world.damageCooldowns.get(p.id);
  return last === undefined || ctx.nowMs - last >= DAMAGE_COOLDOWN_MS;
}

/**
 * Each player consumes at most one bullet per tick. The bullet is gone even
 * when immunity or the damage cooldown blocks the hit.
 */
export function resolveBulletHits(ctx: CombatContext): void {
  const { world } = ctx;

  for (const p of world.players.values()) {
    const idx = world.bullets.findIndex((b) => Math.hypot(p.x - b.x, p.y - b.y) < BULLET_HIT_RADIUS);
    if (idx < 0) continue;

    if (canTakeDamage(ctx, p)) {
      p.health -= 1;
      world.damageCooldowns.set(p.id, ctx.nowMs);
      if (p.health <= 0) {
        p.health = 0;
        world.respawnPlayer(p);
        ctx.onPlayerRespawned(p);
      }
    }

    world.bullets.splice(idx, 1);
  }
}

/** One chaser per attacking player per tick; the kill disarms the attack. */
export function resolveSwordHits(world: World): SwordHit[] {
  const hits: SwordHit[] = [];

  for (const p of world.players.values()) {
    if (!p.swordAttacking) continue;

    const idx = world.chasers.findIndex((c) => Math.hypot(p.x - c.x, p.y - c.y) < SWORD_RADIUS);
    if (idx < 0) continue;

    const [chaser] = world.chasers.splice(idx, 1);
    if (!chaser) continue;

    world.chaserRespawns.set(chaser.id, world.gameTime + CHASER_RESPAWN_DELAY);
    p.score += SWORD_KILL_SCORE;
    world.globalScore += SWORD_KILL_SCORE;
    p.swordAttacking = false;
    hits.push({ playerId: p.id, chaserId: chaser.id });
  }

  return hits;
}
