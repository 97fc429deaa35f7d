import type { Rect, Renderer, Vector2 } from '../types';
import { clamp } from '../utils';
import { Bullet } from './Bullet';
import type { Entity, SimulationContext } from './Entity';

export const PLAYER_WIDTH = 50;
export const PLAYER_HEIGHT = 20;
export const PLAYER_SPEED = 300;
export const MIN_FIRE_RATE = 0.1;

export class Player implements Entity {
  public position: Vector2;
  public readonly width = PLAYER_WIDTH;
  public readonly height = PLAYER_HEIGHT;
  public readonly speed = PLAYER_SPEED;
  public health: number;
  public maxHealth = 3;
  public fireCooldown = 0;
  public fireRate = 0.5;
  /** Tracked and upgradable, but nothing reads it yet. */
  public attackRange = 50;
  private readonly spawnPoint: Vector2;

  constructor(spawnPoint: Vector2) {
    this.spawnPoint = { ...spawnPoint };
    this.position = { ...spawnPoint };
    this.health = this.maxHealth;
  }

  static spawnPointFor(screenWidth: number, screenHeight: number): Vector2 {
    return { x: screenWidth / 2, y: screenHeight - 50 };
  }

  reset() {
    this.position = { ...this.spawnPoint };
    this.health = this.maxHealth;
    this.fireCooldown = 0;
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

  increaseMaxHealth() {
    this.maxHealth += 1;
    this.health += 1;
  }

  upgradeFireRate() {
    const next = this.fireRate - 0.1;
    this.fireRate = next < MIN_FIRE_RATE ? MIN_FIRE_RATE : next;
  }

  upgradeAttackRange() {
    this.attackRange += 10;
  }

  update(dt: number, context: SimulationContext) {
    if (context.controls.left) this.position.x -= this.speed * dt;
    if (context.controls.right) this.position.x += this.speed * dt;
    this.position.x = clamp(this.position.x, 0, context.width - this.width);

    this.fireCooldown -= dt;
    if (this.fireCooldown <= 0) {
      this.fireCooldown = this.fireRate;
      context.fireBullet(new Bullet({ x: this.position.x + this.width / 2, y: this.position.y }, true));
      context.audio.playLaser();
      return true;
    }
    return false;
  }

  draw(renderer: Renderer) {
    renderer.drawRect(this.getHitbox(), '#0079f1');
  }
}
