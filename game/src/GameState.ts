// ============================================
// Game State
// Aggregate root handed to every behavior and to the frame driver
// ============================================

import { ASSET_PATHS, GAME_CONFIG, type EntityId, type SpriteName, type TextureHandle } from '#shared';
import type { AudioSink, HostBindings, RenderBackend, TextureLoader } from './host';
import { silentAudio } from './host';
import { createInputState, type InputState } from './input';
import { EntityRegistry } from './ecs/EntityRegistry';
import { createKitchen, createPlayer } from './ecs/factories';
import { RenderQueue } from './render/RenderQueue';
import { SeededRandom } from './random';
import { logGameReset, logGameStarted } from './logger';

export type SpriteTable = Record<SpriteName, TextureHandle>;

/**
 * GameState - everything one running game owns.
 *
 * The registry, queue and sprite table are created once and reused
 * across resets; only their contents change.
 */
export interface GameState {
  readonly width: number;
  readonly height: number;
  readonly seed: number;

  input: InputState;
  registry: EntityRegistry;
  queue: RenderQueue;
  sprites: SpriteTable;
  rng: SeededRandom;

  score: number;
  elapsed: number;      // Simulated seconds, paused time excluded
  nextCustomer: number; // Seconds until the next arrival
  previousTimestamp: number | null;
  paused: boolean;
  gameOver: boolean;

  player: EntityId;

  backend: RenderBackend;
  audio: AudioSink;
}

/**
 * Resolve every sprite path through the host up front
 */
function loadSprites(textures: TextureLoader): SpriteTable {
  return {
    player: textures.loadTexture(ASSET_PATHS.player),
    heart: textures.loadTexture(ASSET_PATHS.heart),
    lobber: textures.loadTexture(ASSET_PATHS.lobber),
    spreader: textures.loadTexture(ASSET_PATHS.spreader),
    spinner: textures.loadTexture(ASSET_PATHS.spinner),
  };
}

/**
 * Spawn the player and the kitchen into an empty registry
 */
function populate(state: GameState): void {
  const player = createPlayer(state);
  if (player === null) {
    // Only reachable with a registry too small to hold a single entity
    throw new Error(`Registry of ${state.registry.capacity} slots cannot hold the player`);
  }
  state.player = player;
  createKitchen(state);
}

export function createGameState(width: number, height: number, seed: number, host: HostBindings): GameState {
  const state: GameState = {
    width,
    height,
    seed,
    input: createInputState(width, height),
    registry: new EntityRegistry(GAME_CONFIG.MAX_ENTITIES),
    queue: new RenderQueue(),
    sprites: loadSprites(host.textures),
    rng: new SeededRandom(seed),
    score: 0,
    elapsed: 0,
    nextCustomer: 0,
    previousTimestamp: null,
    paused: false,
    gameOver: false,
    player: 0,
    backend: host.backend,
    audio: host.audio ?? silentAudio,
  };

  populate(state);
  logGameStarted(width, height, seed);
  return state;
}

/**
 * Start over in place. The random stream carries on, so a replay after
 * a game over is not a copy of the first run.
 */
export function resetGameState(state: GameState): void {
  logGameReset(state.score);

  state.registry.clear();
  state.queue.reset();
  state.input = createInputState(state.width, state.height);
  state.score = 0;
  state.elapsed = 0;
  state.nextCustomer = 0;
  state.paused = false;
  state.gameOver = false;

  populate(state);
}
