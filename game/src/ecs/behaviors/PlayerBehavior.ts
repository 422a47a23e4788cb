// ============================================
// Player Behavior
// Movement, terrain response, hands and item handling
// ============================================

import {
  ColliderMasks,
  EntityKinds,
  GAME_CONFIG,
  Palette,
  add,
  clampMagnitude,
  magnitude,
  scale,
  splat,
  sub,
  type Entity,
  type EntityKind,
} from '#shared';
import type { GameState } from '../../GameState';
import { checkCollision, resolvePenetration } from '../collision';
import { createDish, createIngredient } from '../factories';
import {
  consumeLeftClick,
  consumeRightClick,
  isHoveringEntity,
  isHoveringRect,
  isMouseMoving,
} from '../../input';
import { drawCircle, drawEntity } from '../../render/draw';
import { logGameOver, logger } from '../../logger';
import { addIngredient, beginCooking, takeDish } from './StoveBehavior';
import type { Behavior } from './types';

/**
 * Step one velocity component toward the pressed direction (-1, 0, 1).
 * With nothing pressed it brakes toward zero without crossing it.
 */
export function accelerateAxis(velocity: number, direction: number, step: number): number {
  if (direction !== 0) return velocity + direction * step;
  if (velocity > 0) return Math.max(velocity - step, 0);
  return Math.min(velocity + step, 0);
}

/**
 * First active entity of `kind` under the cursor that passes `accept`
 */
function findHovered(
  state: GameState,
  kind: EntityKind,
  accept: (entity: Entity) => boolean = () => true
): Entity | null {
  const registry = state.registry;
  for (const id of registry.iterateByKind(kind)) {
    const entity = registry.get(id);
    if (isHoveringEntity(state.input.mousePos, entity) && accept(entity)) {
      return entity;
    }
  }
  return null;
}

/**
 * PlayerBehavior - the cook
 *
 * Handles:
 * - WASD acceleration and the speed cap
 * - Sliding along terrain colliders
 * - The hands (cursor tethered to the player)
 * - Picking up, dropping, stocking stoves and serving
 * - Running out of health
 */
export class PlayerBehavior implements Behavior {
  readonly name = 'PlayerBehavior';
  readonly kind = EntityKinds.Player;

  update(state: GameState, player: Entity, deltaTime: number): void {
    if (player.health <= 0 && !state.gameOver) {
      state.gameOver = true;
      logGameOver(state.score, state.elapsed);
    }

    this.move(state, player, deltaTime);
    this.collide(state, player);
    this.moveHands(state, player, deltaTime);

    if (consumeLeftClick(state.input)) {
      if (player.holding === null) {
        this.pickUp(state, player);
      } else {
        this.release(state, player);
      }
    }

    if (consumeRightClick(state.input)) {
      const stoveEntity = findHovered(state, EntityKinds.Stove);
      if (stoveEntity?.stove && beginCooking(stoveEntity.stove)) {
        state.audio.play('cook-start');
      }
    }

    // Held item rides in the hands
    if (player.holding !== null) {
      const held = state.registry.resolve(player.holding);
      if (held) {
        held.pos = { ...state.input.mousePos };
      } else {
        player.holding = null;
      }
    }

    this.draw(state, player);
  }

  draw(state: GameState, player: Entity): void {
    drawEntity(state.queue, player);
    drawCircle(
      state.queue,
      state.input.mousePos,
      splat(GAME_CONFIG.HAND_SIZE),
      GAME_CONFIG.HAND_Z_INDEX,
      player.holding !== null ? Palette.blue : Palette.green
    );
  }

  // ============================================
  // Movement
  // ============================================

  private move(state: GameState, player: Entity, deltaTime: number): void {
    const input = state.input;
    const step = player.acceleration * deltaTime;

    // Forwards wins over backwards, left over right
    const dirY = input.forwardsDown ? 1 : input.backwardsDown ? -1 : 0;
    const dirX = input.leftDown ? -1 : input.rightDown ? 1 : 0;

    player.vel = clampMagnitude(
      { x: accelerateAxis(player.vel.x, dirX, step), y: accelerateAxis(player.vel.y, dirY, step) },
      player.speed
    );
    player.pos = add(player.pos, scale(player.vel, deltaTime));
  }

  private collide(state: GameState, player: Entity): void {
    const registry = state.registry;
    for (const id of registry.colliders.forMask(ColliderMasks.Terrain).items()) {
      const contact = checkCollision(player, registry.get(id));
      if (contact) {
        resolvePenetration(player, contact);
      }
    }
  }

  /**
   * While the mouse is in use the hands are carried along with the
   * player; they never stray more than HAND_RANGE away.
   */
  private moveHands(state: GameState, player: Entity, deltaTime: number): void {
    const input = state.input;
    if (isMouseMoving(input)) {
      input.mousePos = add(input.mousePos, scale(player.vel, deltaTime));
    }

    const offset = sub(input.mousePos, player.pos);
    if (magnitude(offset) > GAME_CONFIG.HAND_RANGE) {
      input.mousePos = add(player.pos, clampMagnitude(offset, GAME_CONFIG.HAND_RANGE));
    }
  }

  // ============================================
  // Item Handling
  // ============================================

  private pickUp(state: GameState, player: Entity): void {
    const hands = state.input.mousePos;

    const binEntity = findHovered(state, EntityKinds.IngredientBin);
    if (binEntity?.bin) {
      const id = createIngredient(state, binEntity.bin.color, hands);
      if (id !== null) {
        player.holding = id;
        state.audio.play('pickup');
      }
      return;
    }

    const stoveEntity = findHovered(state, EntityKinds.Stove, (e) => e.stove?.state === 'dish-ready');
    if (stoveEntity?.stove) {
      const kind = takeDish(stoveEntity.stove);
      if (kind === null) return;
      const id = createDish(state, kind, hands);
      if (id !== null) {
        player.holding = id;
        state.audio.play('pickup');
      } else {
        logger.warn({ stoveId: stoveEntity.id, dish: kind, event: 'dish_lost' }, `No room for ${kind} from stove`);
      }
      return;
    }

    const isDropped = (e: Entity) => e.droppedTimer !== null;
    const item =
      findHovered(state, EntityKinds.Ingredient, isDropped) ?? findHovered(state, EntityKinds.Dish, isDropped);
    if (item) {
      item.droppedTimer = null;
      item.alpha = 1;
      player.holding = item.id;
      state.audio.play('pickup');
    }
  }

  /**
   * Let go of the held item: into a stove, onto a seat's table spot,
   * or onto the floor where it starts to fade.
   */
  private release(state: GameState, player: Entity): void {
    const held = state.registry.resolve(player.holding);
    player.holding = null;
    if (!held) return;

    if (held.ingredient) {
      const stoveEntity = findHovered(state, EntityKinds.Stove);
      if (stoveEntity?.stove && addIngredient(stoveEntity.stove, held.ingredient.color)) {
        state.registry.destroy(held.id);
        state.audio.play('drop');
        return;
      }
    }

    if (held.dish && this.serve(state, held)) {
      state.audio.play('drop');
      return;
    }

    held.droppedTimer = GAME_CONFIG.DROPPED_EXPIRATION;
    state.audio.play('drop');
  }

  /**
   * Put a dish on the table spot of an occupied seat that has none
   */
  private serve(state: GameState, dish: Entity): boolean {
    const registry = state.registry;
    const target = splat(GAME_CONFIG.SEAT_DISH_TARGET_SIZE);

    for (const id of registry.iterateByKind(EntityKinds.Seat)) {
      const seatEntity = registry.get(id);
      const seat = seatEntity.seat;
      if (!seat || !seat.occupied || seat.dish !== null) continue;

      const spot = add(seatEntity.pos, seat.dishTargetOffset);
      if (isHoveringRect(state.input.mousePos, spot, target)) {
        dish.pos = spot;
        seat.dish = dish.id;
        return true;
      }
    }
    return false;
  }
}
