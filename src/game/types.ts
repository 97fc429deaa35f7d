export interface Vector2 {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

/** `#rrggbb` */
export type Color = string;

export type EnemyType = 'SIMPLE' | 'MID' | 'HARD' | 'BOSS';

export type UpgradeType = 'HEALTH' | 'FIRE_RATE' | 'ATTACK_RANGE';

export type GameState = 'PLAYING' | 'GAME_OVER';

/** Uniform float in [0, 1). */
export type Random = () => number;

export interface Controls {
  left: boolean;
  right: boolean;
  restart: boolean;
}

export interface Notification {
  text: string;
  remaining: number;
}

export interface Renderer {
  beginFrame(background: Color): void;
  endFrame(): void;
  drawRect(rect: Rect, color: Color): void;
  strokeRect(rect: Rect, color: Color): void;
  drawCircle(center: Vector2, radius: number, color: Color): void;
  drawText(text: string, position: Vector2, size: number, color: Color): void;
  measureText(text: string, size: number): Size;
}

/**
 * Fire-and-forget sound triggers. Implementations must never throw back
 * into the simulation.
 */
export interface AudioCue {
  playLaser(): void;
  playExplosion(): void;
  playUpgrade(): void;
  playMusic(): void;
  stopMusic(): void;
  tick(): void;
}

export interface HudData {
  health: number;
  score: number;
  difficulty: string;
  bossCountdown: number | null;
  notifications: readonly Notification[];
}

export interface DifficultyTier {
  bossesDefeated: number;
  enemyType: Exclude<EnemyType, 'BOSS'>;
  label: string;
}
