// ============================================
// Item Behavior
// Drop decay for loose ingredients, dishes and generic scenery
// ============================================

import { EntityKinds, GAME_CONFIG, type Entity } from '#shared';
import type { GameState } from '../../GameState';
import { drawEntity } from '../../render/draw';
import type { Behavior } from './types';

type DecayingKind = typeof EntityKinds.Ingredient | typeof EntityKinds.Dish | typeof EntityKinds.Generic;

/**
 * ItemBehavior - fades out an entity that was dropped on the floor
 *
 * While `droppedTimer` is set the alpha falls linearly from 1 to 0 over
 * DROPPED_EXPIRATION seconds and the entity is destroyed at 0. Held,
 * served and static entities have no timer and only draw.
 */
export class ItemBehavior implements Behavior {
  readonly name: string;

  constructor(readonly kind: DecayingKind) {
    this.name = `ItemBehavior(${kind})`;
  }

  update(state: GameState, entity: Entity, deltaTime: number): void {
    if (entity.droppedTimer !== null) {
      entity.droppedTimer -= deltaTime;
      if (entity.droppedTimer <= 0) {
        state.registry.destroy(entity.id);
        return;
      }
      entity.alpha = entity.droppedTimer / GAME_CONFIG.DROPPED_EXPIRATION;
    }

    this.draw(state, entity);
  }

  draw(state: GameState, entity: Entity): void {
    drawEntity(state.queue, entity);
  }
}
