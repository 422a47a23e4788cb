// ============================================
// Seat Behavior
// ============================================

import { EntityKinds, GAME_CONFIG, Palette, add, splat, type Entity } from '#shared';
import type { GameState } from '../../GameState';
import { drawBorderRect, drawEntity } from '../../render/draw';
import { warnMissingPayload, type Behavior } from './types';

/**
 * SeatBehavior - keeps the seat's weak references honest and shows
 * where a dish should go while a customer is waiting.
 */
export class SeatBehavior implements Behavior {
  readonly name = 'SeatBehavior';
  readonly kind = EntityKinds.Seat;

  update(state: GameState, entity: Entity): void {
    const seat = entity.seat;
    if (!seat) {
      warnMissingPayload(entity, 'seat');
      return;
    }

    const registry = state.registry;
    if (seat.dish !== null && !registry.resolve(seat.dish, EntityKinds.Dish)) {
      seat.dish = null;
    }
    if (seat.customer !== null && !registry.resolve(seat.customer, EntityKinds.Customer)) {
      seat.customer = null;
      seat.occupied = false;
    }

    this.draw(state, entity);
  }

  draw(state: GameState, entity: Entity): void {
    drawEntity(state.queue, entity);

    const seat = entity.seat;
    if (seat && seat.occupied && seat.dish === null) {
      drawBorderRect(
        state.queue,
        add(entity.pos, seat.dishTargetOffset),
        splat(GAME_CONFIG.SEAT_DISH_TARGET_SIZE),
        GAME_CONFIG.SEAT_DISH_TARGET_BORDER,
        entity.zIndex + 1,
        Palette.white
      );
    }
  }
}
