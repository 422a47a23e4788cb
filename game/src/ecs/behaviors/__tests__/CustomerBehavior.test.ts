// ============================================
// CustomerBehavior Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  EntityKinds,
  GAME_CONFIG,
  type CustomerArchetype,
  type CustomerComponent,
  type DishKind,
  type Entity,
  type SeatComponent,
} from '#shared';
import { CustomerBehavior, spawnCustomers } from '../CustomerBehavior';
import { createCustomer, createDish, createSeat } from '../../factories';
import { createBareTestGame, createTestGame, idsOfKind, placePlayer, type TestGame } from '../../../__tests__/testUtils';
import { logCustomerAngry, logCustomerServed, logger } from '../../../logger';

const SEAT_POS = { x: 359, y: 360 };

function requireCustomer(entity: Entity): CustomerComponent {
  if (!entity.customer) throw new Error(`entity ${entity.id} has no customer`);
  return entity.customer;
}

function requireSeat(entity: Entity): SeatComponent {
  if (!entity.seat) throw new Error(`entity ${entity.id} has no seat`);
  return entity.seat;
}

describe('CustomerBehavior', () => {
  let game: TestGame;
  let behavior: CustomerBehavior;
  let seatEntity: Entity;
  let seat: SeatComponent;

  /**
   * Seat a customer at the test seat
   */
  function seatCustomer(archetype: CustomerArchetype = 'lobber', order: DishKind = 'soup'): Entity {
    const id = createCustomer(game.state, seatEntity.id, seatEntity.pos, archetype, order);
    if (id === null) throw new Error('no customer');
    seat.occupied = true;
    seat.customer = id;
    return game.state.registry.get(id);
  }

  /**
   * Put a dish on the test seat's table spot
   */
  function serve(kind: DishKind): number {
    const id = createDish(game.state, kind, { x: SEAT_POS.x + 32, y: SEAT_POS.y });
    if (id === null) throw new Error('no dish');
    seat.dish = id;
    return id;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    game = createBareTestGame();
    behavior = new CustomerBehavior();
    const seatId = createSeat(game.state, SEAT_POS, { x: 32, y: 0 });
    if (seatId === null) throw new Error('no seat');
    seatEntity = game.state.registry.get(seatId);
    seat = requireSeat(seatEntity);
  });

  describe('ordering', () => {
    it('starts out ordering with full patience', () => {
      const customer = requireCustomer(seatCustomer());
      expect(customer.state).toBe('ordering');
      expect(customer.waitTimer).toBe(GAME_CONFIG.CUSTOMER_WAIT_TIME);
      expect(customer.seat).toBe(seatEntity.id);
    });

    it('loses patience over time', () => {
      const entity = seatCustomer();
      behavior.update(game.state, entity, 4);
      expect(requireCustomer(entity).waitTimer).toBe(6);
      expect(requireCustomer(entity).state).toBe('ordering');
    });

    it('turns angry when patience runs out, without firing that frame', () => {
      const entity = seatCustomer();
      behavior.update(game.state, entity, GAME_CONFIG.CUSTOMER_WAIT_TIME);

      const customer = requireCustomer(entity);
      expect(customer.state).toBe('angry');
      expect(customer.fireTimer).toBe(0);
      expect(logCustomerAngry).toHaveBeenCalledWith(entity.id, 'timeout');
      expect(game.audio.played).toEqual(['angry']);
      expect(idsOfKind(game.state, EntityKinds.Projectile)).toEqual([]);
    });
  });

  describe('serving', () => {
    it('eats the dish it ordered and scores', () => {
      const entity = seatCustomer('lobber', 'soup');
      serve('soup');
      behavior.update(game.state, entity, 0.5);

      const customer = requireCustomer(entity);
      expect(customer.state).toBe('eating');
      expect(customer.eatTimer).toBe(GAME_CONFIG.CUSTOMER_EAT_TIME - 0.5);
      expect(game.state.score).toBe(1);
      expect(logCustomerServed).toHaveBeenCalledWith(entity.id, 'soup', 1);
      expect(game.audio.played).toEqual(['served']);
    });

    it('throws away the wrong dish and gets angry', () => {
      const entity = seatCustomer('lobber', 'soup');
      const dishId = serve('pie');
      placePlayer(game.state, { x: 359, y: 420 });
      behavior.update(game.state, entity, 0.1);

      expect(game.state.registry.resolve(dishId, EntityKinds.Dish)).toBeNull();
      expect(seat.dish).toBeNull();
      expect(requireCustomer(entity).state).toBe('angry');
      expect(game.state.score).toBe(0);
      expect(logCustomerAngry).toHaveBeenCalledWith(entity.id, 'wrong_dish');
    });

    it('ignores a dish reference that has gone stale', () => {
      const entity = seatCustomer();
      const dishId = serve('soup');
      game.state.registry.destroy(dishId);
      behavior.update(game.state, entity, 0.1);

      expect(seat.dish).toBeNull();
      expect(requireCustomer(entity).state).toBe('ordering');
    });

    it('leaves after eating and frees the seat', () => {
      const entity = seatCustomer('lobber', 'soup');
      const dishId = serve('soup');
      behavior.update(game.state, entity, 0);
      behavior.update(game.state, entity, GAME_CONFIG.CUSTOMER_EAT_TIME);

      expect(game.state.registry.isActive(entity.id)).toBe(false);
      expect(game.state.registry.isActive(dishId)).toBe(false);
      expect(seat).toEqual({ occupied: false, customer: null, dish: null, dishTargetOffset: { x: 32, y: 0 } });
    });

    it('never goes back to ordering', () => {
      const entity = seatCustomer('lobber', 'soup');
      behavior.update(game.state, entity, GAME_CONFIG.CUSTOMER_WAIT_TIME);
      serve('soup');
      behavior.update(game.state, entity, 0);
      expect(requireCustomer(entity).state).toBe('eating');
    });
  });

  describe('firing', () => {
    function angryCustomer(archetype: CustomerArchetype): Entity {
      const entity = seatCustomer(archetype);
      requireCustomer(entity).state = 'angry';
      return entity;
    }

    function projectileVelocities() {
      return idsOfKind(game.state, EntityKinds.Projectile).map((id) => game.state.registry.get(id).vel);
    }

    it('lobs one shot straight at a distant player', () => {
      // Player starts at (100, 360), 259 to the left of the seat
      const entity = angryCustomer('lobber');
      behavior.update(game.state, entity, 0.1);

      expect(projectileVelocities()).toEqual([{ x: -GAME_CONFIG.PROJECTILE_SPEED, y: 0 }]);
      expect(requireCustomer(entity).fireTimer).toBe(GAME_CONFIG.CUSTOMER_FIRE_TIME);
      expect(game.audio.played).toEqual(['throw']);
    });

    it('waits for the next volley', () => {
      const entity = angryCustomer('lobber');
      behavior.update(game.state, entity, 0.1);
      behavior.update(game.state, entity, 1);
      expect(projectileVelocities()).toHaveLength(1);
      expect(requireCustomer(entity).fireTimer).toBe(2);
    });

    it('holds fire while the player is close, then fires once they back off', () => {
      const entity = angryCustomer('lobber');
      placePlayer(game.state, { x: 300, y: 360 });
      behavior.update(game.state, entity, 0.1);
      expect(projectileVelocities()).toEqual([]);

      placePlayer(game.state, { x: 100, y: 360 });
      behavior.update(game.state, entity, 0.1);
      expect(projectileVelocities()).toHaveLength(1);
    });

    it('fans three shots around the aim', () => {
      const entity = angryCustomer('spreader');
      behavior.update(game.state, entity, 0.1);

      const velocities = projectileVelocities();
      expect(velocities).toHaveLength(3);
      const angles = velocities.map((v) => Math.atan2(v.y, v.x));
      // Aim is straight left (angle π); the fan is ±π/12 around it
      expect(Math.abs(angles[1])).toBeCloseTo(Math.PI);
      expect(Math.abs(angles[0] - angles[2])).toBeCloseTo(2 * Math.PI - 2 * GAME_CONFIG.CUSTOMER_SPREAD_ANGLE);
    });

    it('fires a full ring and turns it for the next volley', () => {
      const entity = angryCustomer('spinner');
      behavior.update(game.state, entity, 0.1);

      const velocities = projectileVelocities();
      expect(velocities).toHaveLength(GAME_CONFIG.CUSTOMER_BARRAGE_COUNT);
      expect(velocities[0]).toEqual({ x: GAME_CONFIG.PROJECTILE_SPEED, y: 0 });
      expect(requireCustomer(entity).barragePhase).toBeCloseTo(GAME_CONFIG.CUSTOMER_BARRAGE_STEP);
    });
  });

  describe('drawing', () => {
    it('shows an order bubble while waiting', () => {
      const entity = seatCustomer('lobber', 'soup');
      behavior.update(game.state, entity, 0);
      const types = [...game.state.queue.drain()].map((c) => c.type);
      expect(types).toEqual(['sprite', 'borderRect', 'circle']);
    });
  });

  it('skips the frame when its seat is gone', () => {
    const entity = seatCustomer();
    game.state.registry.destroy(seatEntity.id);
    behavior.update(game.state, entity, 5);

    expect(requireCustomer(entity).waitTimer).toBe(GAME_CONFIG.CUSTOMER_WAIT_TIME);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('spawnCustomers', () => {
  let game: TestGame;

  beforeEach(() => {
    vi.clearAllMocks();
    game = createTestGame();
  });

  it('seats a customer on the first frame and restarts the countdown', () => {
    spawnCustomers(game.state, 0);

    const customers = idsOfKind(game.state, EntityKinds.Customer);
    expect(customers).toHaveLength(1);
    expect(game.state.nextCustomer).toBe(GAME_CONFIG.CUSTOMER_SPAWN_TIME);

    const customerEntity = game.state.registry.get(customers[0]);
    const customer = requireCustomer(customerEntity);
    const seatEntity = game.state.registry.get(customer.seat);
    const seat = requireSeat(seatEntity);
    expect(seat.occupied).toBe(true);
    expect(seat.customer).toBe(customerEntity.id);
    expect(customerEntity.pos).toEqual(seatEntity.pos);
    expect(customerEntity.sprite).toBe(game.state.sprites[customer.archetype]);
    expect(['salad', 'soup', 'curry', 'pie']).toContain(customer.order);
  });

  it('waits out the countdown between arrivals', () => {
    spawnCustomers(game.state, 0);
    spawnCustomers(game.state, 5);
    expect(idsOfKind(game.state, EntityKinds.Customer)).toHaveLength(1);
    spawnCustomers(game.state, 5);
    expect(idsOfKind(game.state, EntityKinds.Customer)).toHaveLength(2);
  });

  it('never doubles up on a seat', () => {
    for (let i = 0; i < 6; i++) spawnCustomers(game.state, GAME_CONFIG.CUSTOMER_SPAWN_TIME);
    const seats = idsOfKind(game.state, EntityKinds.Seat).map((id) => requireSeat(game.state.registry.get(id)));
    expect(seats.every((s) => s.occupied)).toBe(true);
    expect(new Set(seats.map((s) => s.customer)).size).toBe(6);
  });

  it('skips the arrival when every seat is taken', () => {
    for (const id of idsOfKind(game.state, EntityKinds.Seat)) {
      requireSeat(game.state.registry.get(id)).occupied = true;
    }
    spawnCustomers(game.state, 0);

    expect(idsOfKind(game.state, EntityKinds.Customer)).toEqual([]);
    expect(game.state.nextCustomer).toBe(GAME_CONFIG.CUSTOMER_SPAWN_TIME);
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });
});
