// ============================================
// Projectile Behavior
// Straight-line flight, bounds culling and single-hit damage
// ============================================

import { ColliderMasks, EntityKinds, GAME_CONFIG, add, magnitude, scale, type Entity } from '#shared';
import type { GameState } from '../../GameState';
import { checkCollision } from '../collision';
import { drawEntity } from '../../render/draw';
import { logger } from '../../logger';
import type { Behavior } from './types';

// Projectiles pass through each other
const TARGET_MASKS = [ColliderMasks.Player, ColliderMasks.Terrain] as const;

/**
 * A fresh shot flies over terrain until it has covered
 * PROJECTILE_LOB_DISTANCE. A shot without a projectile payload is never
 * lofted.
 */
function isLofted(entity: Entity): boolean {
  return entity.projectile !== null && entity.projectile.travelled < GAME_CONFIG.PROJECTILE_LOB_DISTANCE;
}

/**
 * ProjectileBehavior - moves thrown food and resolves what it hits
 *
 * Handles:
 * - Constant-velocity movement
 * - Despawn outside the playfield (plus margin)
 * - First contact against player colliders, and terrain once past the lob
 */
export class ProjectileBehavior implements Behavior {
  readonly name = 'ProjectileBehavior';
  readonly kind = EntityKinds.Projectile;

  update(state: GameState, entity: Entity, deltaTime: number): void {
    entity.pos = add(entity.pos, scale(entity.vel, deltaTime));
    if (entity.projectile) {
      entity.projectile.travelled += magnitude(entity.vel) * deltaTime;
    }

    const margin = GAME_CONFIG.PROJECTILE_BOUNDS_MARGIN;
    if (
      entity.pos.x < -margin ||
      entity.pos.x > state.width + margin ||
      entity.pos.y < -margin ||
      entity.pos.y > state.height + margin
    ) {
      state.registry.destroy(entity.id);
      return;
    }

    const registry = state.registry;
    const lofted = isLofted(entity);
    for (const mask of TARGET_MASKS) {
      if (mask === ColliderMasks.Terrain && lofted) continue;
      for (const id of registry.colliders.forMask(mask).items()) {
        const other = registry.get(id);
        if (!checkCollision(entity, other)) continue;

        if (other.health > 0) {
          other.health--;
          state.audio.play('hit');
          logger.debug(
            { projectileId: entity.id, targetId: id, health: other.health, event: 'projectile_hit' },
            `Projectile ${entity.id} hit ${other.kind} ${id}`
          );
        }
        registry.destroy(entity.id);
        return;
      }
    }

    this.draw(state, entity);
  }

  draw(state: GameState, entity: Entity): void {
    drawEntity(state.queue, entity);
  }
}
