import type { World } from './World';
import { BULLET_RADIUS } from './entities/Bullet';
import type { Combatant } from './entities/Entity';
import { UPGRADE_EFFECTS, type Upgrade } from './entities/Upgrade';
import { circleOverlapsRect, rectsOverlap } from './utils';

/** Runs the four passes once, after all motion for the frame. */
export function resolveCollisions(world: World) {
  resolvePlayerBullets(world);
  resolveEnemyContact(world);
  resolveEnemyBullets(world);
  resolveUpgradePickups(world);
}

/** Every hit on a ship, either side, costs health and sounds an explosion. */
export function hit(world: World, target: Combatant, damage: number) {
  target.takeDamage(damage);
  world.audio.playExplosion();
}

/**
 * Each player bullet hits at most the first overlapping enemy. Enemies left
 * at zero health are reaped on the next frame, not here.
 */
export function resolvePlayerBullets(world: World) {
  for (const bullet of world.bullets) {
    if (!bullet.isPlayerBullet) continue;
    const target = world.enemies.find((enemy) =>
      circleOverlapsRect(bullet.position, BULLET_RADIUS, enemy.getHitbox()),
    );
    if (!target) continue;
    hit(world, target, bullet.damage);
    bullet.alive = false;
  }
  world.bullets = world.bullets.filter((bullet) => bullet.alive);
}

export function resolveEnemyContact(world: World) {
  const { player } = world;
  const hitbox = player.getHitbox();
  for (const enemy of world.enemies) {
    if (!rectsOverlap(hitbox, enemy.getHitbox())) continue;
    hit(world, player, enemy.contactDamage);
  }
}

export function resolveEnemyBullets(world: World) {
  const { player } = world;
  const hitbox = player.getHitbox();
  for (const bullet of world.bullets) {
    if (bullet.isPlayerBullet) continue;
    if (!circleOverlapsRect(bullet.position, BULLET_RADIUS, hitbox)) continue;
    hit(world, player, bullet.damage);
    bullet.alive = false;
  }
  world.bullets = world.bullets.filter((bullet) => bullet.alive);
}

export function resolveUpgradePickups(world: World) {
  const { player } = world;
  const hitbox = player.getHitbox();
  const remaining: Upgrade[] = [];
  for (const upgrade of world.upgrades) {
    if (!upgrade.isActive() || !rectsOverlap(hitbox, upgrade.getHitbox())) {
      remaining.push(upgrade);
      continue;
    }
    const effect = UPGRADE_EFFECTS[upgrade.type];
    effect.apply(player);
    world.notify(effect.label);
    upgrade.collect(world.audio);
    world.logger.debug({ type: upgrade.type }, 'upgrade_collected');
  }
  world.upgrades = remaining;
}
