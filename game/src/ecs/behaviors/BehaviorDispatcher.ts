// ============================================
// Behavior Dispatcher
// Runs each active entity's behavior in slot order
// ============================================

import { EntityKinds, GAME_CONFIG, type EntityKind } from '#shared';
import type { GameState } from '../../GameState';
import { logger, perfLogger } from '../../logger';
import type { Behavior, BehaviorTable } from './types';
import { CustomerBehavior } from './CustomerBehavior';
import { IngredientBinBehavior } from './IngredientBinBehavior';
import { ItemBehavior } from './ItemBehavior';
import { PlayerBehavior } from './PlayerBehavior';
import { ProjectileBehavior } from './ProjectileBehavior';
import { SeatBehavior } from './SeatBehavior';
import { StoveBehavior } from './StoveBehavior';

export function createBehaviorTable(): BehaviorTable {
  return {
    [EntityKinds.Player]: new PlayerBehavior(),
    [EntityKinds.Ingredient]: new ItemBehavior(EntityKinds.Ingredient),
    [EntityKinds.IngredientBin]: new IngredientBinBehavior(),
    [EntityKinds.Stove]: new StoveBehavior(),
    [EntityKinds.Dish]: new ItemBehavior(EntityKinds.Dish),
    [EntityKinds.Seat]: new SeatBehavior(),
    [EntityKinds.Customer]: new CustomerBehavior(),
    [EntityKinds.Projectile]: new ProjectileBehavior(),
    [EntityKinds.Generic]: new ItemBehavior(EntityKinds.Generic),
  };
}

/**
 * BehaviorDispatcher - walks the registry once per frame
 *
 * Slots are visited in index order, so an entity spawned into a later
 * slot during the walk is updated in the same frame. A behavior that
 * throws is logged and skipped; the rest of the frame still runs.
 */
export class BehaviorDispatcher {
  constructor(private readonly behaviors: BehaviorTable = createBehaviorTable()) {}

  /**
   * Advance and draw every active entity.
   * Tracks per-kind timing and logs when the frame is slow.
   */
  update(state: GameState, deltaTime: number): void {
    const frameStart = performance.now();
    const timings = new Map<EntityKind, number>();

    for (const entity of state.registry.slots) {
      if (!entity.active) continue;

      const behavior = this.behaviors[entity.kind];
      const start = performance.now();
      try {
        behavior.update(state, entity, deltaTime);
      } catch (error) {
        this.logError(behavior, entity.id, error);
        // Continue with the next entity - don't crash the frame
      }
      timings.set(entity.kind, (timings.get(entity.kind) ?? 0) + performance.now() - start);
    }

    const totalMs = performance.now() - frameStart;

    if (totalMs > GAME_CONFIG.SLOW_FRAME_MS) {
      // Slowest first
      const sorted = [...timings.entries()]
        .map(([kind, ms]) => ({ kind, ms }))
        .sort((a, b) => b.ms - a.ms)
        .filter((t) => t.ms > 0.5);
      const breakdown = sorted.map((t) => `${t.kind}:${t.ms.toFixed(1)}`).join(' ');

      perfLogger.info(
        {
          event: 'slow_frame_breakdown',
          totalMs: totalMs.toFixed(1),
          breakdown: sorted.map((t) => ({ kind: t.kind, ms: parseFloat(t.ms.toFixed(2)) })),
        },
        `Slow frame ${totalMs.toFixed(1)}ms: ${breakdown}`
      );
    }
  }

  /**
   * Queue every active entity's draw commands without advancing anything
   */
  draw(state: GameState): void {
    for (const entity of state.registry.slots) {
      if (!entity.active) continue;

      const behavior = this.behaviors[entity.kind];
      try {
        behavior.draw(state, entity);
      } catch (error) {
        this.logError(behavior, entity.id, error);
      }
    }
  }

  private logError(behavior: Behavior, entityId: number, error: unknown): void {
    logger.error(
      {
        event: 'behavior_error',
        behavior: behavior.name,
        kind: behavior.kind,
        entityId,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      `${behavior.name} threw on entity ${entityId}`
    );
  }
}
