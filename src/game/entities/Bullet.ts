import type { Renderer, Vector2 } from '../types';

export const BULLET_RADIUS = 5;
export const PLAYER_BULLET_SPEED = -500;
export const ENEMY_BULLET_SPEED = 300;

export class Bullet {
  public position: Vector2;
  public speed: number;
  public readonly isPlayerBullet: boolean;
  public readonly damage: number;
  public alive = true;

  constructor(position: Vector2, isPlayerBullet: boolean, damage = 1) {
    this.position = { ...position };
    this.isPlayerBullet = isPlayerBullet;
    this.speed = isPlayerBullet ? PLAYER_BULLET_SPEED : ENEMY_BULLET_SPEED;
    this.damage = damage;
  }

  update(dt: number) {
    this.position.y += this.speed * dt;
  }

  isOutOfScreen(screenHeight: number) {
    return this.position.y < 0 || this.position.y > screenHeight;
  }

  draw(renderer: Renderer) {
    renderer.drawCircle(this.position, BULLET_RADIUS, this.isPlayerBullet ? '#fdf900' : '#e62937');
  }
}
