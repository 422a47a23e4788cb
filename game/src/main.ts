// ============================================
// Headless Runner
// Drives the frame loop on a timer with a counting backend
// ============================================

import type { TextureHandle } from '#shared';
import type { RenderBackend, TextureLoader } from './host';
import { EventType, KeyCode, init, onFrame, onInputEvent } from './index';
import { logger, perfLogger } from './logger';

const GAME_SEED = parseInt(process.env.GAME_SEED || String(Date.now() % 0x7fffffff), 10);
const GAME_WIDTH = parseInt(process.env.GAME_WIDTH || '1280', 10);
const GAME_HEIGHT = parseInt(process.env.GAME_HEIGHT || '720', 10);
const TICK_RATE = parseInt(process.env.TICK_RATE || '60', 10);
const TICK_INTERVAL = 1000 / TICK_RATE;
const PERF_LOG_INTERVAL_MS = 10000; // Log performance stats every 10 seconds

/**
 * Backend that only counts what it is asked to draw
 */
class CountingBackend implements RenderBackend {
  frames = 0;
  drawCalls = 0;

  clearFrame(): void {
    this.frames++;
  }
  drawTexturedQuad(): void {
    this.drawCalls++;
  }
  drawColoredQuad(): void {
    this.drawCalls++;
  }
  drawBorderedQuad(): void {
    this.drawCalls++;
  }
  drawFilledCircle(): void {
    this.drawCalls++;
  }
}

/**
 * Hands out handles 1, 2, 3... one per distinct path
 */
class SequentialTextures implements TextureLoader {
  private readonly handles = new Map<string, TextureHandle>();

  loadTexture(path: string): TextureHandle {
    const existing = this.handles.get(path);
    if (existing !== undefined) return existing;
    const handle = this.handles.size + 1;
    this.handles.set(path, handle);
    return handle;
  }
}

const backend = new CountingBackend();
const state = init(GAME_WIDTH, GAME_HEIGHT, GAME_SEED, { backend, textures: new SequentialTextures() });

// Rolling stats for periodic performance logging
let frameTimesMs: number[] = [];
let lastPerfLogTime = performance.now();
let lastDrawCalls = 0;

const loop = setInterval(() => {
  const now = performance.now();

  // Nobody is at the controls: click through the game-over screen
  if (state.gameOver) {
    onInputEvent(state, EventType.ButtonDown, KeyCode.MouseLeft);
    onInputEvent(state, EventType.ButtonUp, KeyCode.MouseLeft);
  }

  onFrame(state, now);
  frameTimesMs.push(performance.now() - now);

  if (now - lastPerfLogTime >= PERF_LOG_INTERVAL_MS && frameTimesMs.length > 0) {
    const sortedTimes = [...frameTimesMs].sort((a, b) => a - b);
    const avgMs = frameTimesMs.reduce((a, b) => a + b, 0) / frameTimesMs.length;
    const p95Ms = sortedTimes[Math.floor(sortedTimes.length * 0.95)];

    perfLogger.info(
      {
        event: 'tick_stats',
        intervalSec: ((now - lastPerfLogTime) / 1000).toFixed(1),
        tickCount: frameTimesMs.length,
        avgMs: avgMs.toFixed(2),
        maxMs: sortedTimes[sortedTimes.length - 1].toFixed(2),
        p95Ms: p95Ms.toFixed(2),
        budgetMs: TICK_INTERVAL.toFixed(1),
        drawCallsPerFrame: Math.round((backend.drawCalls - lastDrawCalls) / frameTimesMs.length),
        entities: state.registry.activeCount,
        score: state.score,
      },
      `Frames: avg ${avgMs.toFixed(2)}ms, p95 ${p95Ms.toFixed(2)}ms over ${frameTimesMs.length} frames`
    );

    frameTimesMs = [];
    lastDrawCalls = backend.drawCalls;
    lastPerfLogTime = now;
  }
}, TICK_INTERVAL);

logger.info(
  { event: 'runner_started', seed: GAME_SEED, width: GAME_WIDTH, height: GAME_HEIGHT, tickRate: TICK_RATE },
  `Headless runner at ${TICK_RATE} fps`
);

// ============================================
// Graceful Shutdown
// ============================================

function shutdown(signal: string) {
  logger.info(
    { event: 'shutdown_initiated', signal, frames: backend.frames, score: state.score },
    `Received ${signal}, stopping after ${backend.frames} frames`
  );
  clearInterval(loop);
  process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
