import pino from 'pino';
import type { CustomerArchetype, DishKind } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'game.log')
 * @param component - Component name for filtering (e.g., 'game', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Game events (spawns, cooking, customers, lifecycle warnings)
export const logger = createLogger('game.log', 'game');

// Frame timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Game Events
// ============================================

/**
 * Log a fresh game state
 */
export function logGameStarted(width: number, height: number, seed: number) {
  logger.info({ width, height, seed, event: 'game_started' }, `Game started (${width}x${height}, seed ${seed})`);
}

/**
 * Log a replay reset
 */
export function logGameReset(score: number) {
  logger.info({ score, event: 'game_reset' }, `Game reset after scoring ${score}`);
}

/**
 * Log the player running out of health
 */
export function logGameOver(score: number, elapsed: number) {
  logger.info(
    { score, elapsed, event: 'game_over' },
    `Game over: score ${score} after ${elapsed.toFixed(1)}s`
  );
}

/**
 * Log a customer sitting down
 */
export function logCustomerSeated(customerId: number, seatId: number, archetype: CustomerArchetype, order: DishKind) {
  logger.debug(
    { customerId, seatId, archetype, order, event: 'customer_seated' },
    `Customer ${customerId} (${archetype}) seated at ${seatId}, wants ${order}`
  );
}

/**
 * Log a correct dish reaching a customer
 */
export function logCustomerServed(customerId: number, dish: DishKind, score: number) {
  logger.info({ customerId, dish, score, event: 'customer_served' }, `Customer ${customerId} served ${dish}`);
}

/**
 * Log a customer losing patience
 */
export function logCustomerAngry(customerId: number, reason: 'timeout' | 'wrong_dish') {
  logger.info({ customerId, reason, event: 'customer_angry' }, `Customer ${customerId} is angry (${reason})`);
}

/**
 * Log a stove finishing a dish
 */
export function logDishCooked(stoveId: number, dish: DishKind) {
  logger.debug({ stoveId, dish, event: 'dish_cooked' }, `Stove ${stoveId} cooked ${dish}`);
}
