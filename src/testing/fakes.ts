import { vi } from 'vitest';
import type { Bullet } from '../game/entities/Bullet';
import type { SimulationContext } from '../game/entities/Entity';
import type {
  AudioCue,
  Color,
  Controls,
  Random,
  Rect,
  Renderer,
  Size,
  Vector2,
} from '../game/types';
import { World } from '../game/World';

export const idle: Controls = { left: false, right: false, restart: false };

export const constant =
  (value: number): Random =>
  () =>
    value;

/** Replays `values` in order, then repeats the last one. */
export const sequence = (...values: number[]): Random => {
  let index = 0;
  return () => values[Math.min(index++, values.length - 1)];
};

export function createFakeAudio() {
  return {
    playLaser: vi.fn(),
    playExplosion: vi.fn(),
    playUpgrade: vi.fn(),
    playMusic: vi.fn(),
    stopMusic: vi.fn(),
    tick: vi.fn(),
  } satisfies AudioCue;
}

export function createContext(overrides: Partial<SimulationContext> = {}) {
  const fired: Bullet[] = [];
  const context: SimulationContext = {
    width: 800,
    height: 600,
    rng: constant(0.5),
    audio: createFakeAudio(),
    controls: idle,
    fireBullet: (bullet) => {
      fired.push(bullet);
    },
    ...overrides,
  };
  return { context, fired };
}

export function createWorld(options: { rng?: Random; width?: number; height?: number } = {}) {
  const audio = createFakeAudio();
  const world = new World({
    width: options.width ?? 800,
    height: options.height ?? 600,
    audio,
    rng: options.rng ?? constant(0.5),
  });
  return { world, audio };
}

export type DrawCall =
  | { op: 'begin'; color: Color }
  | { op: 'end' }
  | { op: 'rect'; rect: Rect; color: Color }
  | { op: 'stroke'; rect: Rect; color: Color }
  | { op: 'circle'; center: Vector2; radius: number; color: Color }
  | { op: 'text'; text: string; position: Vector2; size: number; color: Color };

/** Records every call. Text measures `size` per character and `size` tall. */
export class RecordingRenderer implements Renderer {
  public calls: DrawCall[] = [];

  beginFrame(color: Color) {
    this.calls.push({ op: 'begin', color });
  }

  endFrame() {
    this.calls.push({ op: 'end' });
  }

  drawRect(rect: Rect, color: Color) {
    this.calls.push({ op: 'rect', rect: { ...rect }, color });
  }

  strokeRect(rect: Rect, color: Color) {
    this.calls.push({ op: 'stroke', rect: { ...rect }, color });
  }

  drawCircle(center: Vector2, radius: number, color: Color) {
    this.calls.push({ op: 'circle', center: { ...center }, radius, color });
  }

  drawText(text: string, position: Vector2, size: number, color: Color) {
    this.calls.push({ op: 'text', text, position: { ...position }, size, color });
  }

  measureText(text: string, size: number): Size {
    return { width: text.length * size, height: size };
  }

  texts() {
    return this.calls.flatMap((call) => (call.op === 'text' ? [call.text] : []));
  }
}
