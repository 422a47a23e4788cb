// ============================================
// Seeded Random
// xorshift32 stream so a seed replays the same game
// ============================================

export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    // xorshift never leaves the all-zero state
    this.state = seed >>> 0 || 1;
  }

  /**
   * Uniform float in [0, 1)
   */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }

  /**
   * Integer in [0, max)
   */
  nextInt(max: number): number {
    return Math.floor(this.next() * max);
  }

  /**
   * Uniform pick; null for an empty list
   */
  pick<T>(items: readonly T[]): T | null {
    if (items.length === 0) return null;
    return items[this.nextInt(items.length)];
  }

  /**
   * Pick proportionally to `weight`; null when nothing has weight
   */
  weighted<T extends { weight: number }>(items: readonly T[]): T | null {
    let total = 0;
    for (const item of items) total += item.weight;
    if (total <= 0) return null;

    let roll = this.next() * total;
    for (const item of items) {
      roll -= item.weight;
      if (roll < 0) return item;
    }
    return items[items.length - 1];
  }
}
