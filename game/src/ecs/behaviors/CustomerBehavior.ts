// ============================================
// Customer Behavior
// ordering → angry → eating, firing patterns and arrivals
// ============================================

import {
  CUSTOMER_ARCHETYPES,
  DISH_COLORS,
  EntityKinds,
  GAME_CONFIG,
  ORDER_WEIGHTS,
  Palette,
  add,
  distance,
  fromAngle,
  normalize,
  rotate,
  splat,
  sub,
  vec2,
  type CustomerComponent,
  type Entity,
  type SeatComponent,
  type Vec2,
} from '#shared';
import type { GameState } from '../../GameState';
import { createCustomer, createProjectile } from '../factories';
import { drawBorderRect, drawCircle, drawEntity } from '../../render/draw';
import { logCustomerAngry, logCustomerSeated, logCustomerServed, logger } from '../../logger';
import { warnMissingPayload, type Behavior } from './types';

const TWO_PI = Math.PI * 2;

// ============================================
// Firing Patterns
// ============================================

/**
 * Throw one volley from `origin` toward `target` using the customer's
 * archetype pattern. Returns the number of projectiles spawned.
 */
export function fireVolley(state: GameState, customer: CustomerComponent, origin: Vec2, target: Vec2): number {
  const aim = normalize(sub(target, origin));
  const directions: Vec2[] = [];

  switch (customer.archetype) {
    case 'lobber':
      directions.push(aim);
      break;
    case 'spreader': {
      const spread = GAME_CONFIG.CUSTOMER_SPREAD_ANGLE;
      directions.push(rotate(aim, -spread), aim, rotate(aim, spread));
      break;
    }
    case 'spinner': {
      // Ring ignores the aim and turns a little every volley
      const count = GAME_CONFIG.CUSTOMER_BARRAGE_COUNT;
      for (let i = 0; i < count; i++) {
        directions.push(fromAngle(customer.barragePhase + (i * TWO_PI) / count));
      }
      customer.barragePhase = (customer.barragePhase + GAME_CONFIG.CUSTOMER_BARRAGE_STEP) % TWO_PI;
      break;
    }
  }

  let spawned = 0;
  for (const direction of directions) {
    if (createProjectile(state, origin, direction) !== null) spawned++;
  }
  if (spawned > 0) state.audio.play('throw');
  return spawned;
}

// ============================================
// Arrivals
// ============================================

/**
 * Count down to the next arrival and seat a new customer on a random
 * free seat when it is due. No free seat skips this arrival.
 */
export function spawnCustomers(state: GameState, deltaTime: number): void {
  state.nextCustomer -= deltaTime;
  if (state.nextCustomer > 0) return;
  state.nextCustomer = GAME_CONFIG.CUSTOMER_SPAWN_TIME;

  const registry = state.registry;
  const freeSeats: Array<{ entity: Entity; seat: SeatComponent }> = [];
  for (const id of registry.iterateByKind(EntityKinds.Seat)) {
    const entity = registry.get(id);
    if (entity.seat && !entity.seat.occupied) {
      freeSeats.push({ entity, seat: entity.seat });
    }
  }

  const chosen = state.rng.pick(freeSeats);
  if (!chosen) {
    logger.debug({ event: 'no_free_seat' }, 'Every seat is taken, skipping arrival');
    return;
  }

  const archetype = state.rng.pick(CUSTOMER_ARCHETYPES) ?? 'lobber';
  const order = state.rng.weighted(ORDER_WEIGHTS)?.dish ?? 'salad';

  const customerId = createCustomer(state, chosen.entity.id, chosen.entity.pos, archetype, order);
  if (customerId === null) return;

  chosen.seat.occupied = true;
  chosen.seat.customer = customerId;
  logCustomerSeated(customerId, chosen.entity.id, archetype, order);
}

// ============================================
// Behavior
// ============================================

/**
 * CustomerBehavior - one seated customer
 *
 * Handles:
 * - Checking the dish on its seat (served or wrong order)
 * - Patience running out
 * - Volleys at the player while angry
 * - Finishing the meal and leaving
 */
export class CustomerBehavior implements Behavior {
  readonly name = 'CustomerBehavior';
  readonly kind = EntityKinds.Customer;

  update(state: GameState, entity: Entity, deltaTime: number): void {
    const customer = entity.customer;
    if (!customer) {
      warnMissingPayload(entity, 'customer');
      return;
    }

    const registry = state.registry;
    const seatEntity = registry.resolve(customer.seat, EntityKinds.Seat);
    const seat = seatEntity?.seat;
    if (!seatEntity || !seat) {
      logger.warn(
        { customerId: entity.id, seatId: customer.seat, event: 'customer_without_seat' },
        `Customer ${entity.id} has no seat`
      );
      return;
    }

    if (customer.state !== 'eating' && seat.dish !== null) {
      this.checkDish(state, entity, customer, seat);
    }

    switch (customer.state) {
      case 'ordering':
        customer.waitTimer -= deltaTime;
        if (customer.waitTimer <= 0) {
          this.becomeAngry(state, entity, customer, 'timeout');
        }
        break;

      case 'angry': {
        customer.fireTimer -= deltaTime;
        if (customer.fireTimer > 0) break;

        // Hold fire while the player is close; the volley goes out as soon as they back off
        const player = registry.resolve(state.player, EntityKinds.Player);
        if (player && distance(player.pos, entity.pos) > GAME_CONFIG.CUSTOMER_SAFE_RADIUS) {
          fireVolley(state, customer, entity.pos, player.pos);
          customer.fireTimer = GAME_CONFIG.CUSTOMER_FIRE_TIME;
        }
        break;
      }

      case 'eating':
        customer.eatTimer -= deltaTime;
        if (customer.eatTimer <= 0) {
          if (seat.dish !== null && registry.isActive(seat.dish)) {
            registry.destroy(seat.dish);
          }
          seat.dish = null;
          seat.customer = null;
          seat.occupied = false;
          registry.destroy(entity.id);
          return;
        }
        break;
    }

    this.draw(state, entity);
  }

  draw(state: GameState, entity: Entity): void {
    drawEntity(state.queue, entity);

    const customer = entity.customer;
    if (!customer || customer.state === 'eating') return;

    // Order bubble above the head
    const bubblePos = add(entity.pos, vec2(0, GAME_CONFIG.CUSTOMER_DIALOG_OFFSET));
    const bubbleSize = splat(GAME_CONFIG.DISH_SIZE + 2 * GAME_CONFIG.CUSTOMER_DIALOG_BORDER + 4);
    const z = GAME_CONFIG.CUSTOMER_DIALOG_Z_INDEX;
    drawBorderRect(
      state.queue,
      bubblePos,
      bubbleSize,
      GAME_CONFIG.CUSTOMER_DIALOG_BORDER,
      z,
      customer.state === 'angry' ? Palette.red : Palette.white
    );
    drawCircle(state.queue, bubblePos, splat(GAME_CONFIG.DISH_SIZE * 0.75), z + 1, DISH_COLORS[customer.order]);
  }

  /**
   * A dish has landed on the seat: eat it if it is the order, otherwise
   * throw it away and get angry.
   */
  private checkDish(state: GameState, entity: Entity, customer: CustomerComponent, seat: SeatComponent): void {
    const dishEntity = state.registry.resolve(seat.dish, EntityKinds.Dish);
    if (!dishEntity || !dishEntity.dish) {
      seat.dish = null;
      return;
    }

    if (dishEntity.dish.kind === customer.order) {
      customer.state = 'eating';
      customer.eatTimer = GAME_CONFIG.CUSTOMER_EAT_TIME;
      state.score++;
      state.audio.play('served');
      logCustomerServed(entity.id, customer.order, state.score);
      return;
    }

    state.registry.destroy(dishEntity.id);
    seat.dish = null;
    this.becomeAngry(state, entity, customer, 'wrong_dish');
  }

  private becomeAngry(
    state: GameState,
    entity: Entity,
    customer: CustomerComponent,
    reason: 'timeout' | 'wrong_dish'
  ): void {
    if (customer.state === 'angry') return;
    customer.state = 'angry';
    customer.fireTimer = 0;
    state.audio.play('angry');
    logCustomerAngry(entity.id, reason);
  }
}
