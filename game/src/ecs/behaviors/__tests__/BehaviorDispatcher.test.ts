// ============================================
// BehaviorDispatcher Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EntityKinds, GAME_CONFIG } from '#shared';
import { BehaviorDispatcher, createBehaviorTable } from '../BehaviorDispatcher';
import type { Behavior } from '../types';
import { createBareTestGame, createTestGame } from '../../../__tests__/testUtils';
import { logger } from '../../../logger';

describe('BehaviorDispatcher', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('registers one behavior per kind', () => {
    const table = createBehaviorTable();
    for (const kind of Object.values(EntityKinds)) {
      expect(table[kind].kind).toBe(kind);
    }
  });

  it('advances and draws every active entity', () => {
    const game = createTestGame();
    const dispatcher = new BehaviorDispatcher();
    dispatcher.update(game.state, 0);

    // Every kitchen entity draws at least once
    expect(game.state.queue.length).toBeGreaterThanOrEqual(game.state.registry.activeCount);
  });

  it('logs a throwing behavior and keeps going', () => {
    const game = createTestGame();
    const broken: Behavior = {
      name: 'BrokenStove',
      kind: EntityKinds.Stove,
      update() {
        throw new Error('stove exploded');
      },
      draw() {
        throw new Error('stove exploded');
      },
    };
    const dispatcher = new BehaviorDispatcher({ ...createBehaviorTable(), [EntityKinds.Stove]: broken });

    game.state.input.forwardsDown = true;
    dispatcher.update(game.state, 0.1);

    expect(logger.error).toHaveBeenCalledTimes(GAME_CONFIG.MAX_STOVES);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'behavior_error', behavior: 'BrokenStove', error: 'stove exploded' }),
      expect.any(String)
    );
    // The player, in slot 0, still moved
    expect(game.state.registry.get(game.state.player).pos.y).toBeGreaterThan(360);
  });

  it('draws without advancing', () => {
    const game = createBareTestGame();
    const dispatcher = new BehaviorDispatcher();
    game.state.input.forwardsDown = true;
    dispatcher.draw(game.state);

    expect(game.state.registry.get(game.state.player).pos).toEqual({ x: 100, y: 360 });
    expect([...game.state.queue.drain()].map((c) => c.type)).toEqual(['sprite', 'circle']);
  });
});
