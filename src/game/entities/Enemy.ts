import type { Color, EnemyType, Rect, Renderer, Vector2 } from '../types';
import { clamp, randomInt } from '../utils';
import { Bullet } from './Bullet';
import type { Entity, SimulationContext } from './Entity';

interface EnemyProfile {
  size: number;
  color: Color;
  health: number;
  speed: number;
  scoreValue: number;
}

export const ENEMY_PROFILES: Record<EnemyType, EnemyProfile> = {
  SIMPLE: { size: 40, color: '#e62937', health: 1, speed: 50, scoreValue: 10 },
  MID: { size: 40, color: '#00e430', health: 1, speed: 70, scoreValue: 25 },
  HARD: { size: 40, color: '#c87aff', health: 2, speed: 90, scoreValue: 50 },
  BOSS: { size: 120, color: '#ffa100', health: 7, speed: 40, scoreValue: 500 },
};

export const SHOOT_INTERVAL = 2.0;
export const BOSS_SHOOT_INTERVAL = 0.5;
export const BOSS_TURN_INTERVAL = 1.5;
export const BOSS_BULLET_DAMAGE = 2;
const BOSS_SPREAD = 3;
const BOSS_JITTER = 20;

export class Enemy implements Entity {
  public readonly type: EnemyType;
  public position: Vector2;
  public readonly width: number;
  public readonly height: number;
  public readonly color: Color;
  public readonly speed: number;
  public readonly scoreValue: number;
  public readonly maxHealth: number;
  public health: number;
  public shootTimer = 0;
  public readonly shootInterval = SHOOT_INTERVAL;
  public direction: Vector2 = { x: 0, y: 1 };
  public directionTimer = 0;

  constructor(position: Vector2, type: EnemyType) {
    const profile = ENEMY_PROFILES[type];
    this.type = type;
    this.position = { ...position };
    this.width = profile.size;
    this.height = profile.size;
    this.color = profile.color;
    this.health = profile.health;
    this.maxHealth = profile.health;
    this.speed = profile.speed;
    this.scoreValue = profile.scoreValue;
  }

  get isBoss() {
    return this.type === 'BOSS';
  }

  /** Damage dealt to the player on contact. */
  get contactDamage() {
    return this.isBoss ? 2 : 1;
  }

  getHitbox(): Rect {
    return { x: this.position.x, y: this.position.y, width: this.width, height: this.height };
  }

  getPosition(): Vector2 {
    return { ...this.position };
  }

  isDead() {
    return this.health <= 0;
  }

  takeDamage(amount = 1) {
    this.health -= amount;
  }

  update(dt: number, context: SimulationContext) {
    return this.isBoss ? this.wander(dt, context) : this.descend(dt, context);
  }

  private descend(dt: number, context: SimulationContext) {
    this.position.y += this.speed * dt;

    this.shootTimer += dt;
    if (this.shootTimer >= this.shootInterval) {
      this.shootTimer = 0;
      context.fireBullet(
        new Bullet({ x: this.position.x + this.width / 2, y: this.position.y + this.height }, false),
      );
      return true;
    }
    return false;
  }

  private wander(dt: number, context: SimulationContext) {
    const { rng } = context;
    this.directionTimer += dt;
    if (this.directionTimer >= BOSS_TURN_INTERVAL) {
      this.directionTimer = 0;
      this.direction = {
        x: randomInt(rng, -10, 10) / 10,
        y: randomInt(rng, 5, 10) / 10,
      };
    }

    this.position.x += this.direction.x * this.speed * dt;
    this.position.y += this.direction.y * this.speed * dt;
    this.position.x = clamp(this.position.x, 0, context.width - this.width);

    this.shootTimer += dt;
    if (this.shootTimer >= BOSS_SHOOT_INTERVAL) {
      this.shootTimer = 0;
      for (let i = 0; i < BOSS_SPREAD; i++) {
        const jitter = randomInt(rng, -BOSS_JITTER, BOSS_JITTER);
        context.fireBullet(
          new Bullet(
            { x: this.position.x + this.width / 2 + jitter, y: this.position.y + this.height },
            false,
            BOSS_BULLET_DAMAGE,
          ),
        );
      }
      return true;
    }
    return false;
  }

  draw(renderer: Renderer) {
    renderer.drawRect(this.getHitbox(), this.color);
    if (this.isBoss) {
      const ratio = Math.max(0, this.health / this.maxHealth);
      renderer.drawRect(
        { x: this.position.x, y: this.position.y - 20, width: this.width * ratio, height: 10 },
        '#e62937',
      );
    }
  }
}
