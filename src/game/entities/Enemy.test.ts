import { describe, expect, it } from 'vitest';
import { constant, createContext, RecordingRenderer } from '../../testing/fakes';
import { Enemy } from './Enemy';

describe('Enemy', () => {
  it.each([
    ['SIMPLE', 40, 1, 50, 10],
    ['MID', 40, 1, 70, 25],
    ['HARD', 40, 2, 90, 50],
    ['BOSS', 120, 7, 40, 500],
  ] as const)('builds %s from its profile', (type, size, health, speed, scoreValue) => {
    const enemy = new Enemy({ x: 10, y: 20 }, type);
    expect(enemy.getHitbox()).toEqual({ x: 10, y: 20, width: size, height: size });
    expect(enemy.health).toBe(health);
    expect(enemy.speed).toBe(speed);
    expect(enemy.scoreValue).toBe(scoreValue);
  });

  it('hits harder on contact when it is a boss', () => {
    expect(new Enemy({ x: 0, y: 0 }, 'HARD').contactDamage).toBe(1);
    expect(new Enemy({ x: 0, y: 0 }, 'BOSS').contactDamage).toBe(2);
  });

  describe('regular behaviour', () => {
    it('descends and fires one bullet every two seconds', () => {
      const enemy = new Enemy({ x: 100, y: 0 }, 'SIMPLE');
      const { context, fired } = createContext();

      expect(enemy.update(1, context)).toBe(false);
      expect(enemy.position).toEqual({ x: 100, y: 50 });

      expect(enemy.update(1, context)).toBe(true);
      expect(enemy.position).toEqual({ x: 100, y: 100 });
      expect(fired).toHaveLength(1);
      expect(fired[0].position).toEqual({ x: 120, y: 140 });
      expect(fired[0].isPlayerBullet).toBe(false);
      expect(fired[0].damage).toBe(1);
      expect(fired[0].speed).toBe(300);
      expect(enemy.shootTimer).toBe(0);
    });
  });

  describe('boss behaviour', () => {
    it('turns, moves and fires a three-bullet spread', () => {
      const boss = new Enemy({ x: 340, y: -120 }, 'BOSS');
      const { context, fired } = createContext({ rng: constant(0.75) });

      expect(boss.update(1.5, context)).toBe(true);

      expect(boss.direction).toEqual({ x: 0.5, y: 0.9 });
      expect(boss.directionTimer).toBe(0);
      expect(boss.position.x).toBeCloseTo(370);
      expect(boss.position.y).toBeCloseTo(-66);
      expect(fired).toHaveLength(3);
      for (const bullet of fired) {
        expect(bullet.damage).toBe(2);
        expect(bullet.isPlayerBullet).toBe(false);
        expect(bullet.position.x).toBeCloseTo(440);
        expect(bullet.position.y).toBeCloseTo(54);
      }
    });

    it('fires every half second', () => {
      const boss = new Enemy({ x: 340, y: 0 }, 'BOSS');
      const { context, fired } = createContext();

      expect(boss.update(0.25, context)).toBe(false);
      expect(boss.update(0.25, context)).toBe(true);
      expect(fired).toHaveLength(3);
    });

    it('keeps wander timers per instance', () => {
      const first = new Enemy({ x: 100, y: 0 }, 'BOSS');
      const second = new Enemy({ x: 400, y: 0 }, 'BOSS');
      const { context } = createContext({ rng: constant(0) });

      first.update(1, context);
      second.update(0.6, context);
      first.update(0.5, context);

      expect(first.direction).toEqual({ x: -1, y: 0.5 });
      expect(second.direction).toEqual({ x: 0, y: 1 });
      expect(second.directionTimer).toBeCloseTo(0.6);
    });

    it('stays within the horizontal bounds', () => {
      const boss = new Enemy({ x: 700, y: 0 }, 'BOSS');
      boss.direction = { x: 1, y: 0.5 };
      const { context } = createContext();

      boss.update(1, context);

      expect(boss.position.x).toBe(680);
      expect(boss.position.y).toBe(20);
    });
  });

  describe('draw', () => {
    it('adds a health bar scaled to remaining boss health', () => {
      const boss = new Enemy({ x: 50, y: 60 }, 'BOSS');
      boss.takeDamage(3);
      const renderer = new RecordingRenderer();

      boss.draw(renderer);

      expect(renderer.calls).toHaveLength(2);
      expect(renderer.calls[0]).toEqual({
        op: 'rect',
        rect: { x: 50, y: 60, width: 120, height: 120 },
        color: '#ffa100',
      });
      const bar = renderer.calls[1];
      expect(bar.op).toBe('rect');
      if (bar.op !== 'rect') return;
      expect(bar.rect.x).toBe(50);
      expect(bar.rect.y).toBe(40);
      expect(bar.rect.width).toBeCloseTo((120 * 4) / 7);
      expect(bar.rect.height).toBe(10);
    });

    it('draws only the body for regular enemies', () => {
      const renderer = new RecordingRenderer();
      new Enemy({ x: 0, y: 0 }, 'MID').draw(renderer);
      expect(renderer.calls).toEqual([
        { op: 'rect', rect: { x: 0, y: 0, width: 40, height: 40 }, color: '#00e430' },
      ]);
    });
  });

  it('never gains health from damage', () => {
    const enemy = new Enemy({ x: 0, y: 0 }, 'HARD');
    enemy.takeDamage();
    expect(enemy.health).toBe(1);
    expect(enemy.isDead()).toBe(false);
    enemy.takeDamage(5);
    expect(enemy.health).toBe(-4);
    expect(enemy.isDead()).toBe(true);
  });
});
