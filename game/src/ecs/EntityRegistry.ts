// ============================================
// Entity Registry
// Fixed-capacity slot array with first-free allocation
// ============================================

import type { Entity, EntityId, EntityInit, EntityKind } from '#shared';
import { ColliderRegistry } from './ColliderList';
import { logger } from '../logger';

/**
 * Outcome of an allocation. Running out of slots is reported, not thrown;
 * the caller decides what to skip.
 */
export type AllocationResult =
  | { ok: true; id: EntityId }
  | { ok: false; reason: 'exhausted' | 'collider-list-full' };

/**
 * Blank record used for inert slots and as the base of every allocation.
 */
function blankEntity(id: EntityId): Entity {
  return {
    active: false,
    id,
    kind: 'generic',
    pos: { x: 0, y: 0 },
    size: { x: 0, y: 0 },
    rotation: 0,
    zIndex: 0,
    sprite: null,
    shape: null,
    color: null,
    alpha: 1,
    vel: { x: 0, y: 0 },
    acceleration: 0,
    speed: 0,
    health: 0,
    collider: null,
    holding: null,
    droppedTimer: null,
    ingredient: null,
    bin: null,
    dish: null,
    stove: null,
    seat: null,
    customer: null,
    projectile: null,
  };
}

/**
 * EntityRegistry - owns every entity slot and the collider lists.
 *
 * Manages:
 * - Allocation (first inactive slot, scanned from 0)
 * - Destruction (soft delete via the active flag)
 * - Collider (de)registration
 * - Weak reference resolution
 */
export class EntityRegistry {
  readonly colliders: ColliderRegistry;
  private readonly entities: Entity[];

  constructor(readonly capacity: number) {
    this.colliders = new ColliderRegistry(capacity);
    this.entities = Array.from({ length: capacity }, (_, i) => blankEntity(i));
  }

  // ============================================
  // Entity Lifecycle
  // ============================================

  /**
   * Claim the first free slot and initialize it from `template`.
   * Vectors are copied so the template can be reused.
   */
  allocate(template: EntityInit): AllocationResult {
    const id = this.entities.findIndex((e) => !e.active);
    if (id === -1) {
      logger.error(
        { capacity: this.capacity, kind: template.kind ?? 'generic', event: 'registry_exhausted' },
        'No free entity slots!'
      );
      return { ok: false, reason: 'exhausted' };
    }

    const entity = Object.assign(this.entities[id], blankEntity(id), template);
    entity.pos = { ...entity.pos };
    entity.size = { ...entity.size };
    entity.vel = { ...entity.vel };
    entity.active = true;
    entity.id = id;

    if (entity.shape === 'circle' && entity.size.x !== entity.size.y) {
      logger.warn(
        { entityId: id, kind: entity.kind, size: entity.size, event: 'circle_size_mismatch' },
        'Circle does not have equal width and height!'
      );
    }

    if (entity.collider && !this.colliders.forMask(entity.collider.mask).add(id)) {
      entity.active = false;
      return { ok: false, reason: 'collider-list-full' };
    }

    return { ok: true, id };
  }

  /**
   * Deactivate an entity and drop it from its collider list.
   */
  destroy(id: EntityId): void {
    const entity = this.entities[id];
    if (!entity || !entity.active) {
      logger.warn({ entityId: id, event: 'destroy_inactive' }, `Entity ${id} is not active`);
      return;
    }

    entity.active = false;
    if (entity.collider) {
      this.colliders.forMask(entity.collider.mask).remove(id);
    }
  }

  // ============================================
  // Access
  // ============================================

  /**
   * Raw slot storage. The returned record may be inactive.
   */
  get(id: EntityId): Entity {
    return this.entities[id];
  }

  isActive(id: EntityId): boolean {
    return this.entities[id]?.active ?? false;
  }

  /**
   * Dereference a weak id. Returns null for a missing id, a dead slot,
   * or (when `kind` is given) a slot that has been reused by another kind.
   */
  resolve(id: EntityId | null, kind?: EntityKind): Entity | null {
    if (id === null) return null;

    const entity = this.entities[id];
    if (!entity || !entity.active) {
      logger.debug({ entityId: id, event: 'dead_reference' }, `Reference to dead entity ${id}`);
      return null;
    }
    if (kind && entity.kind !== kind) {
      logger.debug(
        { entityId: id, expected: kind, actual: entity.kind, event: 'stale_reference' },
        `Entity ${id} is a ${entity.kind}, expected ${kind}`
      );
      return null;
    }
    return entity;
  }

  /**
   * Lazily yield the ids of active entities of one kind.
   * Scans the whole array; call again to restart.
   */
  *iterateByKind(kind: EntityKind): Generator<EntityId> {
    for (let id = 0; id < this.entities.length; id++) {
      const entity = this.entities[id];
      if (entity.active && entity.kind === kind) {
        yield id;
      }
    }
  }

  /**
   * Every slot in index order, active or not.
   */
  get slots(): readonly Entity[] {
    return this.entities;
  }

  get activeCount(): number {
    let count = 0;
    for (const entity of this.entities) {
      if (entity.active) count++;
    }
    return count;
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Deactivate every slot and empty the collider lists.
   */
  clear(): void {
    for (let id = 0; id < this.entities.length; id++) {
      Object.assign(this.entities[id], blankEntity(id));
    }
    this.colliders.clear();
  }
}
