import pino, { type Logger } from 'pino';
import type {
  AudioCue,
  Controls,
  EnemyType,
  GameState,
  HudData,
  Notification,
  Random,
  Vector2,
} from './types';
import { createRandom, pickOne } from './utils';
import { resolveCollisions } from './collisions';
import { Bullet } from './entities/Bullet';
import { Enemy } from './entities/Enemy';
import type { SimulationContext } from './entities/Entity';
import { Player } from './entities/Player';
import { UPGRADE_TYPES, Upgrade } from './entities/Upgrade';
import { SpawnDirector } from './waves/SpawnDirector';

export const NOTIFICATION_DURATION = 2.0;
export const UPGRADE_DROP_CHANCE = 0.2;

const IDLE_CONTROLS: Controls = { left: false, right: false, restart: false };

export interface WorldOptions {
  width: number;
  height: number;
  audio: AudioCue;
  rng?: Random;
  logger?: Logger;
}

/**
 * Owns every entity collection, the score and the PLAYING/GAME_OVER state.
 * Nothing here runs outside of `update`.
 */
export class World implements SimulationContext {
  public readonly width: number;
  public readonly height: number;
  public readonly rng: Random;
  public readonly audio: AudioCue;
  public readonly logger: Logger;
  public readonly player: Player;
  public readonly director: SpawnDirector;

  public state: GameState = 'PLAYING';
  public score = 0;
  public enemies: Enemy[] = [];
  public bullets: Bullet[] = [];
  public upgrades: Upgrade[] = [];
  public notifications: Notification[] = [];
  public controls: Controls = IDLE_CONTROLS;

  constructor(options: WorldOptions) {
    this.width = options.width;
    this.height = options.height;
    this.audio = options.audio;
    this.rng = options.rng ?? createRandom();
    this.logger = options.logger ?? pino({ enabled: false });
    this.player = new Player(Player.spawnPointFor(this.width, this.height));
    this.director = new SpawnDirector(this);
  }

  get hud(): HudData {
    return {
      health: Math.max(0, this.player.health),
      score: this.score,
      difficulty: this.director.tier.label,
      bossCountdown: this.director.bossCountdown,
      notifications: this.notifications,
    };
  }

  begin() {
    this.audio.playMusic();
    this.logger.info({ width: this.width, height: this.height }, 'game_started');
  }

  update(dt: number, controls: Controls) {
    const step = Number.isFinite(dt) ? Math.max(0, dt) : 0;
    this.controls = controls;

    if (this.state === 'GAME_OVER') {
      if (controls.restart) {
        this.restart();
      }
      return;
    }

    this.audio.tick();
    this.player.update(step, this);

    if (this.player.isDead()) {
      this.state = 'GAME_OVER';
      this.logger.info(
        { score: this.score, bossesDefeated: this.director.bossesDefeated },
        'game_over',
      );
      return;
    }

    this.director.spawnEnemies(step);
    this.director.spawnBoss(step);

    this.updateBullets(step);
    this.updateEnemies(step);
    this.updateUpgrades(step);
    this.updateNotifications(step);

    resolveCollisions(this);
  }

  restart() {
    this.enemies = [];
    this.bullets = [];
    this.upgrades = [];
    this.notifications = [];
    this.score = 0;
    this.director.reset();
    this.player.reset();
    this.audio.stopMusic();
    this.audio.playMusic();
    this.state = 'PLAYING';
    this.logger.info({ maxHealth: this.player.maxHealth }, 'game_restarted');
  }

  fireBullet(bullet: Bullet) {
    this.bullets.push(bullet);
  }

  spawnEnemy(type: EnemyType, position: Vector2) {
    const enemy = new Enemy(position, type);
    this.enemies.push(enemy);
    return enemy;
  }

  spawnUpgrade(position: Vector2) {
    const upgrade = new Upgrade(pickOne(this.rng, UPGRADE_TYPES), position);
    this.upgrades.push(upgrade);
    return upgrade;
  }

  notify(text: string, duration = NOTIFICATION_DURATION) {
    this.notifications.push({ text, remaining: duration });
  }

  private updateBullets(dt: number) {
    for (const bullet of this.bullets) {
      bullet.update(dt);
    }
    this.bullets = this.bullets.filter((bullet) => !bullet.isOutOfScreen(this.height));
  }

  private updateEnemies(dt: number) {
    for (const enemy of this.enemies) {
      enemy.update(dt, this);
    }

    // Only dead enemies are reaped. One that slips past the bottom edge stays
    // in play, and keeps firing, until it is shot down or the game restarts.
    for (const enemy of this.enemies) {
      if (!enemy.isDead()) continue;
      const dropPosition = enemy.getPosition();

      if (enemy.isBoss) {
        this.director.onBossDefeated();
        this.spawnUpgrade(dropPosition);
        this.notify('BOSS DEFEATED!');
        this.logger.info({ bossesDefeated: this.director.bossesDefeated }, 'boss_defeated');
      } else if (this.rng() < UPGRADE_DROP_CHANCE) {
        this.spawnUpgrade(dropPosition);
      }

      this.score += enemy.scoreValue;
    }
    this.enemies = this.enemies.filter((enemy) => !enemy.isDead());
  }

  private updateUpgrades(dt: number) {
    for (const upgrade of this.upgrades) {
      upgrade.update(dt);
    }
    this.upgrades = this.upgrades.filter((upgrade) => upgrade.isActive());
  }

  private updateNotifications(dt: number) {
    for (const notification of this.notifications) {
      notification.remaining -= dt;
    }
    this.notifications = this.notifications.filter((notification) => notification.remaining > 0);
  }
}
