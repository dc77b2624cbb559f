import test from 'node:test';
import assert from 'node:assert/strict';

import { maybeSpawnPowerup } from '../src/game/systems/pickups';
import { accrueScores } from '../src/game/systems/scoring';
import { World } from '../src/game/World';
import { constRng } from './helpers';

test('survival points arrive every ten game seconds', () => {
  const world = new World();
  const p = world.addPlayer(1);

  world.gameTime = 9.99;
  accrueScores(world);
  assert.equal(p.score, 0);
  assert.equal(world.globalScore, 0);

  world.gameTime = 10;
  accrueScores(world);
  assert.equal(p.score, 1);
  assert.equal(world.globalScore, 1);
  assert.equal(p.lastScoreTime, 10);

  world.gameTime = 15;
  accrueScores(world);
  assert.equal(p.score, 1);

  world.gameTime = 20;
  accrueScores(world);
  assert.equal(p.score, 2);
  assert.equal(world.globalScore, 2);
});

test('a late joiner waits a full interval from when they joined', () => {
  const world = new World();
  world.gameTime = 12;
  const p = world.addPlayer(1);

  world.gameTime = 21;
  accrueScores(world);
  assert.equal(p.score, 0);
  assert.equal(world.globalScore, 1);

  world.gameTime = 22;
  accrueScores(world);
  assert.equal(p.score, 1);
});

test('a powerup spawns only when the roll is under the chance', () => {
  const world = new World();

  assert.equal(maybeSpawnPowerup(world, constRng(0.5)), null);
  assert.deepEqual(world.powerups, []);

  const spawned = maybeSpawnPowerup(world, constRng(0));
  assert.deepEqual(spawned, { type: 'health', x: 50, y: 50 });
  assert.deepEqual(world.powerups, [{ type: 'health', x: 50, y: 50 }]);
});
