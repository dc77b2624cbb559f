import { type RNG } from '@stalked/shared';
import type { Player, World } from './World';
import { fireChasers, respawnChasers, spawnChasers, updateChasers } from './systems/chasers';
import { moveBullets, resolveBulletHits, resolveSwordHits, type SwordHit } from './systems/combat';
import { maybeSpawnPowerup } from './systems/pickups';
import { accrueScores } from './systems/scoring';

export interface SimulationEvents {
  playerRespawned: (player: Player) => void;
  chaserKilled?: (hit: SwordHit) => void;
}

/**
 * Game rules for one tick. Time is wall-clock driven: each tick advances
 * game time by the measured delta, with no fixed-step accumulator.
 */
export class Simulation {
  private lastUpdateMs: number | null = null;

  constructor(
    private readonly world: World,
    private readonly rng: RNG,
    private readonly events: SimulationEvents
  ) {}

  /**
   * Advances the world to nowMs. The previous-tick timestamp moves on every
   * call, so time spent outside PLAYING never reaches game time.
   */
  tick(nowMs: number): void {
    const dtSeconds = this.lastUpdateMs === null ? 0 : Math.max(0, (nowMs - this.lastUpdateMs) / 1000);
    this.lastUpdateMs = nowMs;

    if (!this.world.isPlaying) return;

    this.world.gameTime += dtSeconds;
    this.step(nowMs);
  }

  /** Fixed order: AI, fire, bullets, collisions, spawns, respawns, scoring. */
  step(nowMs: number): void {
    const world = this.world;

    updateChasers(world);
    fireChasers(world);
    moveBullets(world);

    resolveBulletHits({
      world,
      nowMs,
      onPlayerRespawned: (p) => this.events.playerRespawned(p)
    });
    for (const hit of resolveSwordHits(world)) {
      this.events.chaserKilled?.(hit);
    }

    maybeSpawnPowerup(world, this.rng);
    respawnChasers(world, this.rng);
    accrueScores(world);
  }

  startGame(): void {
    this.world.resetForNewGame();
    spawnChasers(this.world, this.rng);
  }
}
