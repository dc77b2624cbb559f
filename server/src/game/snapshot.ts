import type { ChaserSnapshot, GameStateFields, PlayerSnapshot } from '@stalked/shared';
import type { Chaser, Player, World } from './World';

export function toPlayerSnapshot(p: Player): PlayerSnapshot {
  return {
    id: p.id,
    x: p.x,
    y: p.y,
    angle: p.angle,
    health: p.health,
    max_health: p.maxHealth,
    score: p.score,
    character: p.character,
    sword_attacking: p.swordAttacking,
    speed_boost_active: p.speedBoostActive,
    immunity_boost_active: p.immunityBoostActive
  };
}

export function toChaserSnapshot(c: Chaser): ChaserSnapshot {
  return { id: c.id, x: c.x, y: c.y, angle: c.angle, speed: c.speed, health: c.health };
}

export function buildGameState(world: World): GameStateFields {
  return {
    state: world.phase,
    players: [...world.players.values()].map(toPlayerSnapshot),
    chasers: world.chasers.map(toChaserSnapshot),
    bullets: world.bullets.map((b) => ({ x: b.x, y: b.y, dx: b.dx, dy: b.dy })),
    powerups: world.powerups.map((p) => ({ type: p.type, x: p.x, y: p.y })),
    game_time: world.gameTime,
    difficulty: world.difficulty,
    global_score: world.globalScore
  };
}
