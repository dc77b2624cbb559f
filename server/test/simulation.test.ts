import test from 'node:test';
import assert from 'node:assert/strict';

import { Difficulty, GamePhase } from '@stalked/shared';
import { Simulation } from '../src/game/Simulation';
import { World, type Player } from '../src/game/World';
import { constRng } from './helpers';

// A constant 0.5 roll drops every chaser on the player spawn (lit, so idle)
// and never spawns a powerup.
function makeSim(difficulty: Difficulty = Difficulty.MEDIUM) {
  const world = new World(difficulty);
  const respawned: Player[] = [];
  const sim = new Simulation(world, constRng(0.5), { playerRespawned: (p) => respawned.push(p) });
  return { world, sim, respawned };
}

test('ticks outside PLAYING do not advance game time', () => {
  const { world, sim } = makeSim();
  world.addPlayer(1);

  sim.tick(1_000);
  sim.tick(20_000);

  assert.equal(world.phase, GamePhase.MENU);
  assert.equal(world.gameTime, 0);
  assert.equal(world.globalScore, 0);
});

test('time spent in the menu does not leak into the first game tick', () => {
  const { world, sim } = makeSim();
  sim.tick(1_000);
  sim.startGame();
  sim.tick(1_016);

  assert.ok(Math.abs(world.gameTime - 0.016) < 1e-9);
});

test('startGame resets scores, projectiles and positions', () => {
  const { world, sim } = makeSim(Difficulty.HARD);
  const p = world.addPlayer(1);
  p.score = 7;
  p.x = 10;
  p.health = 2;
  world.globalScore = 3;
  world.bullets = [{ x: 1, y: 1, dx: 1, dy: 1 }];
  world.powerups = [{ type: 'speed', x: 60, y: 60 }];
  world.chaserRespawns.set(0, 99);

  sim.startGame();

  assert.equal(world.phase, GamePhase.PLAYING);
  assert.equal(world.chasers.length, 3);
  assert.deepEqual(world.bullets, []);
  assert.deepEqual(world.powerups, []);
  assert.equal(world.chaserRespawns.size, 0);
  assert.equal(world.globalScore, 0);
  assert.deepEqual([p.x, p.y, p.health, p.score], [400, 300, 6, 0]);
});

test('global score accrues only while PLAYING', () => {
  const { world, sim } = makeSim();
  const p = world.addPlayer(1);

  sim.startGame();
  sim.tick(0);
  sim.tick(10_000);
  assert.equal(world.gameTime, 10);
  assert.equal(world.globalScore, 1);
  assert.equal(p.score, 1);

  world.phase = GamePhase.GAME_OVER;
  sim.tick(40_000);
  assert.equal(world.gameTime, 10);
  assert.equal(world.globalScore, 1);
});

test('a lethal bullet during a tick raises the respawn event', () => {
  const { world, sim, respawned } = makeSim();
  const p = world.addPlayer(1);
  sim.startGame();
  p.health = 1;
  world.bullets = [{ x: 400, y: 300, dx: 0, dy: 0 }];

  sim.tick(0);

  assert.deepEqual(
    respawned.map((r) => r.id),
    [1]
  );
  assert.equal(p.health, 6);
  assert.deepEqual(world.bullets, []);
});

test('a killed chaser comes back two game seconds later', () => {
  const { world, sim } = makeSim(Difficulty.EASY);
  const p = world.addPlayer(1);
  sim.startGame();
  p.swordAttacking = true;

  sim.tick(0);
  assert.equal(world.chasers.length, 0);
  assert.equal(world.chaserRespawns.get(0), 2);

  sim.tick(1_999);
  assert.equal(world.chasers.length, 0);

  sim.tick(2_500);
  assert.equal(world.chasers.length, 1);
  assert.equal(world.chasers[0]?.id, 0);
  assert.equal(p.score, 5);
});
