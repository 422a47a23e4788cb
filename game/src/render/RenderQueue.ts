// ============================================
// Render Queue
// z-ordered singly-linked list of deferred draw commands
// ============================================

import { GAME_CONFIG } from '#shared';
import type { RenderBackend } from '../host';
import { logger } from '../logger';
import { FrameArena } from './FrameArena';
import { executeRenderCommand, type RenderCommand } from './commands';

interface QueueNode {
  zIndex: number;
  command: RenderCommand | null;
  next: QueueNode | null;
}

/**
 * RenderQueue - collects draw calls during the simulation step and
 * replays them back-to-front at the end of the frame.
 *
 * Insertion keeps the list sorted by ascending zIndex; equal zIndex
 * values keep push order. Nodes come from a per-frame arena, so a
 * command must never be held past the frame that pushed it.
 */
export class RenderQueue {
  private readonly arena: FrameArena<QueueNode>;
  private head: QueueNode | null = null;
  private tail: QueueNode | null = null;
  private count = 0;

  constructor(capacity: number = GAME_CONFIG.MAX_RENDER_COMMANDS) {
    this.arena = new FrameArena(capacity, () => ({ zIndex: 0, command: null, next: null }));
  }

  get length(): number {
    return this.count;
  }

  /**
   * Insert a command in z order. Returns false (and drops the command)
   * when the frame arena is exhausted.
   */
  push(command: RenderCommand): boolean {
    const node = this.arena.alloc();
    if (!node) {
      logger.error(
        { zIndex: command.zIndex, type: command.type, capacity: this.arena.capacity, event: 'render_enqueue_failed' },
        'Failed to add render command!'
      );
      return false;
    }

    node.zIndex = command.zIndex;
    node.command = command;
    node.next = null;
    this.count++;

    if (!this.head || !this.tail) {
      this.head = node;
      this.tail = node;
      return true;
    }

    // Common case: drawn in order
    if (this.tail.zIndex <= node.zIndex) {
      this.tail.next = node;
      this.tail = node;
      return true;
    }

    if (this.head.zIndex > node.zIndex) {
      node.next = this.head;
      this.head = node;
      return true;
    }

    // Walk to the last node that should stay in front of this one
    let prev = this.head;
    while (prev.next && prev.next.zIndex <= node.zIndex) {
      prev = prev.next;
    }
    node.next = prev.next;
    prev.next = node;
    return true;
  }

  /**
   * Yield every queued command in ascending z order, exactly once.
   * The queue is empty as soon as draining starts.
   */
  *drain(): Generator<RenderCommand> {
    let node = this.head;
    this.head = null;
    this.tail = null;
    this.count = 0;

    while (node) {
      const next = node.next;
      if (node.command) {
        yield node.command;
      }
      node.command = null;
      node.next = null;
      node = next;
    }
  }

  /**
   * Drain against the backend, then free the arena.
   * Returns the number of commands executed.
   */
  flush(backend: RenderBackend): number {
    let executed = 0;
    for (const command of this.drain()) {
      executeRenderCommand(command, backend);
      executed++;
    }
    this.arena.reset();
    return executed;
  }

  /**
   * Drop everything queued and free the arena.
   */
  reset(): void {
    this.head = null;
    this.tail = null;
    this.count = 0;
    this.arena.reset();
  }
}
