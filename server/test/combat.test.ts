import test from 'node:test';
import assert from 'node:assert/strict';

import { moveBullets, resolveBulletHits, resolveSwordHits, type CombatContext } from '../src/game/systems/combat';
import { World, type Player } from '../src/game/World';

function ctx(world: World, nowMs: number, respawned: Player[] = []): CombatContext {
  return { world, nowMs, onPlayerRespawned: (p) => respawned.push(p) };
}

test('moveBullets advances bullets and drops those leaving the arena', () => {
  const world = new World();
  world.bullets = [
    { x: 798, y: 10, dx: 5, dy: 0 },
    { x: 100, y: 100, dx: 1, dy: 1 }
  ];

  moveBullets(world);

  assert.deepEqual(world.bullets, [{ x: 101, y: 101, dx: 1, dy: 1 }]);
});

test('a bullet within range costs one health and is consumed', () => {
  const world = new World();
  const p = world.addPlayer(1);
  world.bullets = [{ x: 410, y: 300, dx: 0, dy: 0 }];

  resolveBulletHits(ctx(world, 10_000));

  assert.equal(p.health, 5);
  assert.equal(world.damageCooldowns.get(1), 10_000);
  assert.deepEqual(world.bullets, []);
});

test('a player consumes at most one bullet per tick', () => {
  const world = new World();
  const p = world.addPlayer(1);
  world.bullets = [
    { x: 405, y: 300, dx: 0, dy: 0 },
    { x: 395, y: 300, dx: 0, dy: 0 }
  ];

  resolveBulletHits(ctx(world, 10_000));

  assert.equal(p.health, 5);
  assert.deepEqual(world.bullets, [{ x: 395, y: 300, dx: 0, dy: 0 }]);
});

test('the damage cooldown blocks a hit but still eats the bullet', () => {
  const world = new World();
  const p = world.addPlayer(1);

  world.bullets = [{ x: 400, y: 300, dx: 0, dy: 0 }];
  resolveBulletHits(ctx(world, 10_000));

  world.bullets = [{ x: 400, y: 300, dx: 0, dy: 0 }];
  resolveBulletHits(ctx(world, 10_500));
  assert.equal(p.health, 5);
  assert.deepEqual(world.bullets, []);

  world.bullets = [{ x: 400, y: 300, dx: 0, dy: 0 }];
  resolveBulletHits(ctx(world, 11_000));
  assert.equal(p.health, 4);
});

test('immunity blocks damage but still eats the bullet', () => {
  const world = new World();
  const p = world.addPlayer(1);
  p.immunityBoostActive = true;
  world.bullets = [{ x: 400, y: 300, dx: 0, dy: 0 }];

  resolveBulletHits(ctx(world, 0));

  assert.equal(p.health, 6);
  assert.deepEqual(world.bullets, []);
  assert.equal(world.damageCooldowns.has(1), false);
});

test('the last health point respawns the player at the center', () => {
  const world = new World();
  const p = world.addPlayer(1);
  p.x = 100;
  p.y = 100;
  p.health = 1;
  world.bullets = [{ x: 100, y: 105, dx: 0, dy: 0 }];
  const respawned: Player[] = [];

  resolveBulletHits(ctx(world, 0, respawned));

  assert.equal(p.health, 6);
  assert.equal(p.x, 400);
  assert.equal(p.y, 300);
  assert.deepEqual(
    respawned.map((r) => r.id),
    [1]
  );
});

test('a sword hit kills the nearest-listed chaser and scores five', () => {
  const world = new World();
  const p = world.addPlayer(1);
  p.swordAttacking = true;
  world.gameTime = 10;
  world.chasers = [
    { id: 0, x: 450, y: 300, angle: 0, speed: 1, health: 1 },
    { id: 1, x: 460, y: 300, angle: 0, speed: 1, health: 1 }
  ];

  const hits = resolveSwordHits(world);

  assert.deepEqual(hits, [{ playerId: 1, chaserId: 0 }]);
  assert.deepEqual(
    world.chasers.map((c) => c.id),
    [1]
  );
  assert.equal(world.chaserRespawns.get(0), 12);
  assert.equal(p.score, 5);
  assert.equal(world.globalScore, 5);
  assert.equal(p.swordAttacking, false);
});

test('two attackers on one chaser remove it exactly once', () => {
  const world = new World();
  const a = world.addPlayer(1);
  const b = world.addPlayer(2);
  a.swordAttacking = true;
  b.swordAttacking = true;
  b.x = 420;
  world.chasers = [{ id: 0, x: 410, y: 300, angle: 0, speed: 1, health: 1 }];

  const hits = resolveSwordHits(world);

  assert.deepEqual(hits, [{ playerId: 1, chaserId: 0 }]);
  assert.equal(world.chasers.length, 0);
  assert.equal(world.globalScore, 5);
  assert.equal(b.score, 0);
  assert.equal(b.swordAttacking, true);
});

test('a sword swing that hits nothing stays armed', () => {
  const world = new World();
  const p = world.addPlayer(1);
  p.swordAttacking = true;
  world.chasers = [{ id: 0, x: 600, y: 300, angle: 0, speed: 1, health: 1 }];

  assert.deepEqual(resolveSwordHits(world), []);
  assert.equal(p.swordAttacking, true);
  assert.equal(world.chasers.length, 1);
});
