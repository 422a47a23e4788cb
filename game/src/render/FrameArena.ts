// ============================================
// Frame Arena
// Bump allocator over reusable objects, reset once per frame
// ============================================

/**
 * FrameArena - hands out pooled objects in order and takes them all
 * back at once. Objects are created lazily up to `capacity` and then
 * recycled every frame, so steady-state frames allocate nothing.
 *
 * Anything handed out is invalid after `reset()`.
 */
export class FrameArena<T> {
  private readonly pool: T[] = [];
  private cursor = 0;

  constructor(
    readonly capacity: number,
    private readonly create: () => T
  ) {}

  /**
   * Next free object, or null when the frame's budget is spent
   */
  alloc(): T | null {
    if (this.cursor >= this.capacity) return null;

    if (this.cursor === this.pool.length) {
      this.pool.push(this.create());
    }
    const item = this.pool[this.cursor];
    this.cursor++;
    return item;
  }

  /**
   * Objects handed out since the last reset
   */
  get used(): number {
    return this.cursor;
  }

  reset(): void {
    this.cursor = 0;
  }
}
