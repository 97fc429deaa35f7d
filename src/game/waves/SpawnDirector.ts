import type { World } from '../World';
import { getDifficultyTier } from '../difficulty';
import { randomInt } from '../utils';
import { ENEMY_PROFILES } from '../entities/Enemy';

export const ENEMY_SPAWN_INTERVAL = 2.0;
export const BOSS_SPAWN_INTERVAL = 60.0;
export const MIN_ENEMIES_PER_SPAWN = 1;
export const MAX_ENEMIES_PER_SPAWN = 4;

export class SpawnDirector {
  private readonly world: World;
  public enemySpawnTimer = 0;
  public bossSpawnTimer = 0;
  public bossesDefeated = 0;
  public bossActive = false;

  constructor(world: World) {
    this.world = world;
  }

  get tier() {
    return getDifficultyTier(this.bossesDefeated);
  }

  /** Whole seconds until the next boss, or null while one is alive. */
  get bossCountdown(): number | null {
    if (this.bossActive) return null;
    return BOSS_SPAWN_INTERVAL - Math.floor(this.bossSpawnTimer);
  }

  spawnEnemies(dt: number) {
    this.enemySpawnTimer += dt;
    if (this.enemySpawnTimer < ENEMY_SPAWN_INTERVAL) return;

    this.enemySpawnTimer = 0;
    const { rng, width } = this.world;
    const type = this.tier.enemyType;
    const size = ENEMY_PROFILES[type].size;
    const count = randomInt(rng, MIN_ENEMIES_PER_SPAWN, MAX_ENEMIES_PER_SPAWN);
    for (let i = 0; i < count; i++) {
      const x = randomInt(rng, 0, Math.max(0, width - size));
      this.world.spawnEnemy(type, { x, y: -size });
    }
  }

  spawnBoss(dt: number) {
    if (this.bossActive) return;

    this.bossSpawnTimer += dt;
    if (this.bossSpawnTimer < BOSS_SPAWN_INTERVAL) return;

    this.bossSpawnTimer = 0;
    this.bossActive = true;
    const size = ENEMY_PROFILES.BOSS.size;
    const position = { x: this.world.width / 2 - size / 2, y: -size };
    this.world.spawnEnemy('BOSS', position);
    this.world.notify('BOSS INCOMING!');
    this.world.logger.info({ position }, 'boss_spawned');
  }

  onBossDefeated() {
    this.bossesDefeated += 1;
    this.bossActive = false;
  }

  reset() {
    this.enemySpawnTimer = 0;
    this.bossSpawnTimer = 0;
    this.bossesDefeated = 0;
    this.bossActive = false;
  }
}
