// ============================================
// Ingredient Bin Behavior
// ============================================

import { EntityKinds, GAME_CONFIG, Palette, type Entity } from '#shared';
import type { GameState } from '../../GameState';
import { drawBorderRect, drawRect } from '../../render/draw';
import type { Behavior } from './types';

/**
 * IngredientBinBehavior - bins are passive; the player behavior takes
 * ingredients out of them. Draws the bin's color with a dark rim.
 */
export class IngredientBinBehavior implements Behavior {
  readonly name = 'IngredientBinBehavior';
  readonly kind = EntityKinds.IngredientBin;

  update(state: GameState, entity: Entity): void {
    this.draw(state, entity);
  }

  draw(state: GameState, entity: Entity): void {
    drawRect(state.queue, entity.pos, entity.size, entity.zIndex, entity.color ?? Palette.white);
    drawBorderRect(state.queue, entity.pos, entity.size, GAME_CONFIG.STOVE_BORDER, entity.zIndex, Palette.darkGrey);
  }
}
