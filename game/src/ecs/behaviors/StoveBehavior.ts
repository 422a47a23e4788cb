// ============================================
// Stove Behavior
// idle → cooking → dish-ready, plus the stove's drawing
// ============================================

import {
  DISH_COLORS,
  EntityKinds,
  GAME_CONFIG,
  INGREDIENT_COLOR_VALUES,
  Palette,
  add,
  fromAngle,
  resolveRecipe,
  scale,
  splat,
  vec2,
  type DishKind,
  type Entity,
  type IngredientColor,
  type StoveComponent,
} from '#shared';
import type { GameState } from '../../GameState';
import { logDishCooked } from '../../logger';
import { drawBorderRect, drawCircle, drawRect } from '../../render/draw';
import { warnMissingPayload, type Behavior } from './types';

const INGREDIENT_DOT_SIZE = 10;
const TWO_PI = Math.PI * 2;

// ============================================
// Stove Operations
// ============================================

/**
 * Drop an ingredient in. Only an idle stove with room accepts it.
 */
export function addIngredient(stove: StoveComponent, color: IngredientColor): boolean {
  if (stove.state !== 'idle' || stove.ingredients.length >= GAME_CONFIG.MAX_INGREDIENTS) {
    return false;
  }
  stove.ingredients.push(color);
  return true;
}

/**
 * Light the stove. Needs at least one ingredient.
 */
export function beginCooking(stove: StoveComponent): boolean {
  if (stove.state !== 'idle' || stove.ingredients.length === 0) {
    return false;
  }
  stove.state = 'cooking';
  stove.cookTimer = GAME_CONFIG.COOKING_TIME;
  return true;
}

/**
 * Take the finished dish off the stove, leaving it idle
 */
export function takeDish(stove: StoveComponent): DishKind | null {
  if (stove.state !== 'dish-ready' || stove.result === null) {
    return null;
  }
  const dish = stove.result;
  stove.result = null;
  stove.state = 'idle';
  return dish;
}

// ============================================
// Behavior
// ============================================

/**
 * StoveBehavior - advances the cooking timer and animations
 *
 * The recipe is resolved once, when the timer runs out; the ingredient
 * list is consumed at that point.
 */
export class StoveBehavior implements Behavior {
  readonly name = 'StoveBehavior';
  readonly kind = EntityKinds.Stove;

  update(state: GameState, entity: Entity, deltaTime: number): void {
    const stove = entity.stove;
    if (!stove) {
      warnMissingPayload(entity, 'stove');
      return;
    }

    if (stove.state === 'cooking') {
      stove.cookTimer -= deltaTime;
      stove.spinPhase = (stove.spinPhase + GAME_CONFIG.INGREDIENT_SPIN_SPEED * TWO_PI * deltaTime) % TWO_PI;
      stove.flamePhase = (stove.flamePhase + GAME_CONFIG.FLAME_FLICKER_SPEED * deltaTime) % TWO_PI;

      if (stove.cookTimer <= 0) {
        stove.result = resolveRecipe(stove.ingredients);
        stove.ingredients = [];
        stove.cookTimer = 0;
        stove.state = 'dish-ready';
        logDishCooked(entity.id, stove.result);
        state.audio.play('cook-done');
      }
    }

    this.draw(state, entity);
  }

  draw(state: GameState, entity: Entity): void {
    const stove = entity.stove;
    if (!stove) return;

    const queue = state.queue;
    const z = entity.zIndex;

    drawRect(queue, entity.pos, entity.size, z, Palette.darkGrey);
    drawBorderRect(queue, entity.pos, entity.size, GAME_CONFIG.STOVE_BORDER, z, Palette.lightGrey);

    if (stove.state === 'cooking') {
      // Flame strip along the bottom edge, height flickering with the phase
      const flicker = 0.75 + 0.25 * Math.sin(stove.flamePhase);
      const flameHeight = entity.size.y * 0.2 * flicker;
      const flamePos = vec2(entity.pos.x, entity.pos.y - entity.size.y / 2 + GAME_CONFIG.STOVE_BORDER + flameHeight / 2);
      drawRect(queue, flamePos, vec2(entity.size.x * 0.8, flameHeight), z + 1, Palette.orange);
    }

    // Ingredients orbit the center
    const count = stove.ingredients.length;
    const orbit = entity.size.x / 4;
    stove.ingredients.forEach((color, i) => {
      const angle = stove.spinPhase + (i * TWO_PI) / count;
      const dotPos = add(entity.pos, scale(fromAngle(angle), orbit));
      drawCircle(queue, dotPos, splat(INGREDIENT_DOT_SIZE), z + 2, INGREDIENT_COLOR_VALUES[color]);
    });

    if (stove.state === 'dish-ready' && stove.result !== null) {
      drawCircle(queue, entity.pos, splat(GAME_CONFIG.DISH_SIZE), z + 3, DISH_COLORS[stove.result]);
    }
  }
}
