import type { Random, Rect, Vector2 } from './types';

export const clamp = (value: number, min: number, max: number) =>
  Math.max(min, Math.min(max, value));

export const distanceSq = (a: Vector2, b: Vector2) => {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
};

export const rectsOverlap = (a: Rect, b: Rect) =>
  a.x < b.x + b.width &&
  a.x + a.width > b.x &&
  a.y < b.y + b.height &&
  a.y + a.height > b.y;

export const circleOverlapsRect = (center: Vector2, radius: number, rect: Rect) => {
  const closest = {
    x: clamp(center.x, rect.x, rect.x + rect.width),
    y: clamp(center.y, rect.y, rect.y + rect.height),
  };
  return distanceSq(center, closest) <= radius * radius;
};

/** Inclusive on both ends. */
export const randomInt = (rng: Random, min: number, max: number) =>
  min + Math.min(max - min, Math.floor(rng() * (max - min + 1)));

export const pickOne = <T>(rng: Random, items: readonly T[]): T =>
  items[randomInt(rng, 0, items.length - 1)];

function mulberry32(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number): Random {
  const initial = seed ?? Math.floor(Math.random() * 0xffffffff);
  return mulberry32(initial);
}
