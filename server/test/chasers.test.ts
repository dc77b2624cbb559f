import test from 'node:test';
import assert from 'node:assert/strict';

import { Difficulty, RNG } from '@stalked/shared';
import {
  findNearestPlayer,
  fireChasers,
  respawnChasers,
  rollChaserSpawn,
  spawnChasers,
  updateChasers
} from '../src/game/systems/chasers';
import { World, type Chaser } from '../src/game/World';
import { constRng, seqRng } from './helpers';

function chaser(id: number, x: number, y: number, speed = 1): Chaser {
  return { id, x, y, angle: 0, speed, health: 1 };
}

test('findNearestPlayer picks the closest player', () => {
  const world = new World();
  const a = world.addPlayer(1);
  const b = world.addPlayer(2);
  a.x = 100;
  a.y = 100;
  b.x = 300;
  b.y = 100;

  const nearest = findNearestPlayer(world.players.values(), 250, 100);
  assert.equal(nearest?.player.id, 2);
  assert.equal(nearest?.distance, 50);
  assert.equal(findNearestPlayer([], 0, 0), null);
});

test('a lit chaser at distance 100 neither moves nor fires', () => {
  const world = new World(Difficulty.MEDIUM);
  world.addPlayer(1); // at 400,300
  world.chasers = [chaser(0, 500, 300)];
  world.gameTime = 5;

  updateChasers(world);
  assert.equal(fireChasers(world), 0);

  assert.equal(world.chasers[0]?.x, 500);
  assert.equal(world.chasers[0]?.y, 300);
  assert.deepEqual(world.bullets, []);
  assert.equal(world.lastBulletTime, 5);
});

test('an unlit chaser steps toward the player and fires', () => {
  const world = new World(Difficulty.MEDIUM);
  world.addPlayer(1);
  world.chasers = [chaser(0, 700, 300, 1)];
  world.gameTime = 2;

  updateChasers(world);
  const c = world.chasers[0];
  assert.equal(c?.x, 699);
  assert.equal(c?.y, 300);
  assert.ok(Math.abs((c?.angle ?? 0) - 180) < 1e-9);

  assert.equal(fireChasers(world), 1);
  assert.deepEqual(world.bullets, [{ x: 699, y: 300, dx: -5, dy: 0 }]);
});

test('chasers hold fire until the volley interval has passed', () => {
  const world = new World(Difficulty.MEDIUM);
  world.addPlayer(1);
  world.chasers = [chaser(0, 600, 300)];
  world.gameTime = 1.5;

  assert.equal(fireChasers(world), 0);
  assert.equal(world.lastBulletTime, 0);
});

test('a chaser exactly at fire range does not shoot but the clock still resets', () => {
  const world = new World(Difficulty.MEDIUM);
  world.addPlayer(1);
  world.chasers = [chaser(0, 800, 300)];
  world.gameTime = 2;

  assert.equal(fireChasers(world), 0);
  assert.equal(world.lastBulletTime, 2);
});

test('with no players the volley clock still advances and nothing moves', () => {
  const world = new World(Difficulty.MEDIUM);
  world.chasers = [chaser(0, 700, 300)];
  world.gameTime = 3;

  updateChasers(world);
  assert.equal(fireChasers(world), 0);
  assert.equal(world.chasers[0]?.x, 700);
  assert.equal(world.lastBulletTime, 3);
});

test('rollChaserSpawn rejects points too close to the player spawn', () => {
  // 0.5,0.5 lands on 400,300 (rejected); 0,0 lands on 100,100
  assert.deepEqual(rollChaserSpawn(seqRng([0.5, 0.5, 0, 0])), { x: 100, y: 100 });
});

test('rollChaserSpawn gives up after its attempts and keeps the last sample', () => {
  let calls = 0;
  const rng = new RNG(() => {
    calls++;
    return 0.5;
  });
  assert.deepEqual(rollChaserSpawn(rng), { x: 400, y: 300 });
  assert.equal(calls, 100);
});

test('spawnChasers follows the difficulty table', () => {
  const easy = new World(Difficulty.EASY);
  spawnChasers(easy, RNG.seeded(7));
  assert.equal(easy.chasers.length, 1);
  assert.equal(easy.chasers[0]?.speed, 2.0);

  const hard = new World(Difficulty.HARD);
  spawnChasers(hard, RNG.seeded(7));
  assert.deepEqual(
    hard.chasers.map((c) => c.id),
    [0, 1, 2]
  );
  for (const c of hard.chasers) {
    assert.equal(c.speed, 0.5);
    assert.ok(Number.isInteger(c.x) && c.x >= 100 && c.x <= 700);
    assert.ok(Number.isInteger(c.y) && c.y >= 100 && c.y <= 500);
  }
});

test('respawnChasers brings a chaser back once its time arrives', () => {
  const world = new World(Difficulty.MEDIUM);
  world.chaserRespawns.set(1, 5);

  world.gameTime = 4.9;
  assert.deepEqual(respawnChasers(world, constRng(0)), []);
  assert.equal(world.chasers.length, 0);

  world.gameTime = 5;
  assert.deepEqual(respawnChasers(world, constRng(0)), [1]);
  assert.deepEqual(world.chasers, [{ id: 1, x: 100, y: 100, angle: 0, speed: 1, health: 1 }]);
  assert.equal(world.chaserRespawns.size, 0);
});
