import type { AudioCue, Color, Rect, Renderer, UpgradeType, Vector2 } from '../types';
import type { Player } from './Player';

export const UPGRADE_SIZE = 30;
export const UPGRADE_FALL_SPEED = 100;
export const UPGRADE_LIFETIME = 5;

export const UPGRADE_TYPES: readonly UpgradeType[] = ['HEALTH', 'FIRE_RATE', 'ATTACK_RANGE'];

interface UpgradeEffect {
  label: string;
  apply(player: Player): void;
}

export const UPGRADE_EFFECTS: Record<UpgradeType, UpgradeEffect> = {
  HEALTH: {
    label: 'MAX HEALTH +1',
    apply: (player) => player.increaseMaxHealth(),
  },
  FIRE_RATE: {
    label: 'FIRE RATE UP!',
    apply: (player) => player.upgradeFireRate(),
  },
  ATTACK_RANGE: {
    label: 'ATTACK RANGE +',
    apply: (player) => player.upgradeAttackRange(),
  },
};

const colors: Record<UpgradeType, Color> = {
  HEALTH: '#00e430',
  FIRE_RATE: '#0079f1',
  ATTACK_RANGE: '#fdf900',
};

export class Upgrade {
  public readonly type: UpgradeType;
  public position: Vector2;
  public readonly fallSpeed = UPGRADE_FALL_SPEED;
  public timer = UPGRADE_LIFETIME;
  public active = true;

  constructor(type: UpgradeType, position: Vector2) {
    this.type = type;
    this.position = { ...position };
  }

  update(dt: number) {
    if (!this.active) return;
    this.position.y += this.fallSpeed * dt;
    this.timer -= dt;
  }

  /** Plays the pickup cue and deactivates. Stat changes live in UPGRADE_EFFECTS. */
  collect(audio: AudioCue) {
    if (!this.active) return;
    audio.playUpgrade();
    this.active = false;
  }

  isActive() {
    return this.active && this.timer > 0;
  }

  getHitbox(): Rect {
    return { x: this.position.x, y: this.position.y, width: UPGRADE_SIZE, height: UPGRADE_SIZE };
  }

  draw(renderer: Renderer) {
    if (!this.active) return;
    const hitbox = this.getHitbox();
    renderer.drawRect(hitbox, colors[this.type]);
    renderer.strokeRect(hitbox, '#ffffff');
  }
}
