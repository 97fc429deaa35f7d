import { describe, expect, it } from 'vitest';
import { createWorld } from '../../testing/fakes';

describe('SpawnDirector', () => {
  it('spawns a batch of the current tier once the interval elapses', () => {
    const { world } = createWorld();
    const { director } = world;

    director.spawnEnemies(1.5);
    expect(world.enemies).toHaveLength(0);

    director.spawnEnemies(0.5);
    expect(director.enemySpawnTimer).toBe(0);
    expect(world.enemies.map((enemy) => [enemy.type, enemy.position])).toEqual([
      ['SIMPLE', { x: 380, y: -40 }],
      ['SIMPLE', { x: 380, y: -40 }],
      ['SIMPLE', { x: 380, y: -40 }],
    ]);
  });

  it('brings in one boss per minute and pauses the countdown while it lives', () => {
    const { world } = createWorld();
    const { director } = world;

    director.spawnBoss(12.5);
    expect(director.bossCountdown).toBe(48);

    director.spawnBoss(47.5);
    expect(world.enemies).toHaveLength(1);
    expect(world.enemies[0].position).toEqual({ x: 340, y: -120 });
    expect(world.notifications.map((n) => n.text)).toEqual(['BOSS INCOMING!']);
    expect(director.bossCountdown).toBeNull();

    director.spawnBoss(120);
    expect(world.enemies).toHaveLength(1);
  });

  it('raises the tier with each boss defeated', () => {
    const { world } = createWorld();
    const { director } = world;
    director.bossActive = true;

    director.onBossDefeated();

    expect(director.bossActive).toBe(false);
    expect(director.tier.enemyType).toBe('MID');
    director.onBossDefeated();
    expect(director.tier.label).toBe('Hard');
  });
});
