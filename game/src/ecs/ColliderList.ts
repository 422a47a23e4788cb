// ============================================
// Collider Registries
// One fixed-capacity id list per collider mask
// ============================================

import { COLLIDER_MASKS, type ColliderMask, type EntityId } from '#shared';
import { logger } from '../logger';

/**
 * ColliderList - unordered set of entity ids backed by a fixed array.
 *
 * Removal swaps the last element into the hole, so order is not
 * preserved but membership is.
 */
export class ColliderList {
  private readonly ids: Uint16Array;
  private count = 0;

  constructor(
    readonly mask: ColliderMask,
    capacity: number
  ) {
    this.ids = new Uint16Array(capacity);
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.ids.length;
  }

  /**
   * Live view of the occupied prefix. Invalidated by add/remove.
   */
  items(): Uint16Array {
    return this.ids.subarray(0, this.count);
  }

  has(id: EntityId): boolean {
    return this.items().indexOf(id) !== -1;
  }

  /**
   * Append an id. A full list means the capacity invariant is broken;
   * that is logged as an error and reported to the caller.
   */
  add(id: EntityId): boolean {
    if (this.count >= this.ids.length) {
      logger.error(
        { mask: this.mask, entityId: id, capacity: this.ids.length, event: 'collider_list_full' },
        `Collider list '${this.mask}' is full`
      );
      return false;
    }

    this.ids[this.count] = id;
    this.count++;
    return true;
  }

  /**
   * Swap-remove an id. Missing ids are a no-op with a warning.
   */
  remove(id: EntityId): boolean {
    const index = this.items().indexOf(id);
    if (index === -1) {
      logger.warn(
        { mask: this.mask, entityId: id, event: 'collider_remove_missing' },
        `Failed to remove entity ${id} from collider list '${this.mask}'`
      );
      return false;
    }

    this.ids[index] = this.ids[this.count - 1];
    this.count--;
    return true;
  }

  clear(): void {
    this.count = 0;
  }
}

/**
 * ColliderRegistry - the per-mask lists, keyed by mask.
 */
export class ColliderRegistry {
  private readonly lists: Record<ColliderMask, ColliderList>;

  constructor(capacity: number) {
    this.lists = {
      player: new ColliderList('player', capacity),
      terrain: new ColliderList('terrain', capacity),
      projectile: new ColliderList('projectile', capacity),
    };
  }

  forMask(mask: ColliderMask): ColliderList {
    return this.lists[mask];
  }

  /**
   * Total ids across every mask
   */
  get size(): number {
    let total = 0;
    for (const mask of COLLIDER_MASKS) {
      total += this.lists[mask].size;
    }
    return total;
  }

  clear(): void {
    for (const mask of COLLIDER_MASKS) {
      this.lists[mask].clear();
    }
  }
}
