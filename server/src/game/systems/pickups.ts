import {
  POWERUP_MARGIN,
  POWERUP_SPAWN_CHANCE,
  POWERUP_TYPES,
  WORLD_HEIGHT,
  WORLD_WIDTH,
  type RNG
} from '@stalked/shared';
import type { Powerup, World } from '../World';

// Powerups are only spawned. Pickup is resolved by clients, which report the
// resulting flags/health through player_update.
export function maybeSpawnPowerup(world: World, rng: RNG): Powerup | null {
  if (rng.next() >= POWERUP_SPAWN_CHANCE) return null;

  const powerup: Powerup = {
    type: rng.pick(POWERUP_TYPES),
    x: rng.int(POWERUP_MARGIN, WORLD_WIDTH - POWERUP_MARGIN),
    y: rng.int(POWERUP_MARGIN, WORLD_HEIGHT - POWERUP_MARGIN)
  };
  world.powerups.push(powerup);
  return powerup;
}
