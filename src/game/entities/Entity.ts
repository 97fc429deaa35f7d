import type { AudioCue, Controls, Random, Rect, Renderer, Vector2 } from '../types';
import type { Bullet } from './Bullet';
import type { Enemy } from './Enemy';
import type { Player } from './Player';

/** What an entity may see and touch while it updates. */
export interface SimulationContext {
  readonly width: number;
  readonly height: number;
  readonly rng: Random;
  readonly audio: AudioCue;
  readonly controls: Controls;
  fireBullet(bullet: Bullet): void;
}

export interface Entity {
  getHitbox(): Rect;
  getPosition(): Vector2;
  isDead(): boolean;
  takeDamage(amount?: number): void;
  /** Returns true when the entity fired this frame. */
  update(dt: number, context: SimulationContext): boolean;
  draw(renderer: Renderer): void;
}

export type Combatant = Player | Enemy;
