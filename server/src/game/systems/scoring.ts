import { SCORE_INTERVAL } from '@stalked/shared';
import type { World } from '../World';

/** Survival points: +1 per player and +1 global every SCORE_INTERVAL game seconds. */
export function accrueScores(world: World): void {
  for (const p of world.players.values()) {
    if (world.gameTime - p.lastScoreTime >= SCORE_INTERVAL) {
      p.score += 1;
      p.lastScoreTime = world.gameTime;
    }
  }

  if (world.gameTime - world.lastGlobalScoreTime >= SCORE_INTERVAL) {
    world.globalScore += 1;
    world.lastGlobalScoreTime = world.gameTime;
  }
}
