// ============================================
// Behavior Types
// ============================================

import type { Entity, EntityKind } from '#shared';
import type { GameState } from '../../GameState';
import { logger } from '../../logger';

/**
 * Base Behavior interface
 * One implementation per entity kind
 */
export interface Behavior {
  /** Behavior name for debugging/logging */
  readonly name: string;

  /** Kind this behavior is registered for */
  readonly kind: EntityKind;

  /**
   * Called every unpaused frame for each active entity of `kind`.
   * Ends by drawing the entity unless it was destroyed.
   * @param deltaTime Time since last frame in seconds
   */
  update(state: GameState, entity: Entity, deltaTime: number): void;

  /**
   * Queue the entity's draw commands without advancing it.
   * Paused and game-over frames only call this.
   */
  draw(state: GameState, entity: Entity): void;
}

/**
 * One behavior for every kind - a missing entry is a compile error
 */
export type BehaviorTable = { readonly [K in EntityKind]: Behavior };

/**
 * Log an entity whose kind promises a payload it does not carry
 */
export function warnMissingPayload(entity: Entity, payload: string): void {
  logger.warn(
    { entityId: entity.id, kind: entity.kind, payload, event: 'missing_payload' },
    `Entity ${entity.id} (${entity.kind}) has no ${payload} payload`
  );
}
