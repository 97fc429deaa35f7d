import { describe, expect, it } from 'vitest';
import { RecordingRenderer } from '../../testing/fakes';
import { Bullet } from './Bullet';

describe('Bullet', () => {
  it('travels up when fired by the player and down otherwise', () => {
    const mine = new Bullet({ x: 10, y: 300 }, true);
    const theirs = new Bullet({ x: 10, y: 300 }, false);
    mine.update(0.5);
    theirs.update(0.5);
    expect(mine.position).toEqual({ x: 10, y: 50 });
    expect(theirs.position).toEqual({ x: 10, y: 450 });
  });

  it('defaults to one damage', () => {
    expect(new Bullet({ x: 0, y: 0 }, false).damage).toBe(1);
    expect(new Bullet({ x: 0, y: 0 }, false, 2).damage).toBe(2);
  });

  it('is out of screen strictly beyond the top or bottom edge', () => {
    expect(new Bullet({ x: 0, y: 0 }, true).isOutOfScreen(600)).toBe(false);
    expect(new Bullet({ x: 0, y: 600 }, true).isOutOfScreen(600)).toBe(false);
    expect(new Bullet({ x: 0, y: -0.5 }, true).isOutOfScreen(600)).toBe(true);
    expect(new Bullet({ x: 0, y: 600.5 }, false).isOutOfScreen(600)).toBe(true);
  });

  it('draws a small circle coloured by owner', () => {
    const renderer = new RecordingRenderer();
    new Bullet({ x: 5, y: 6 }, true).draw(renderer);
    new Bullet({ x: 7, y: 8 }, false).draw(renderer);
    expect(renderer.calls).toEqual([
      { op: 'circle', center: { x: 5, y: 6 }, radius: 5, color: '#fdf900' },
      { op: 'circle', center: { x: 7, y: 8 }, radius: 5, color: '#e62937' },
    ]);
  });
});
