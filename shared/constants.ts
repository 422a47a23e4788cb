// ============================================
// Game Constants & Configuration
// Static tuning values for the kitchen simulation
// ============================================

export const GAME_CONFIG = {
  // Registry
  MAX_ENTITIES: 512, // Fixed slot count, never grows
  MAX_RENDER_COMMANDS: 4096, // Per-frame arena capacity

  // Input latches (frames)
  MOUSE_CLICKED_FRAMES: 5, // A click stays "fresh" for this many frames
  MOUSE_MOVING_FRAMES: 5, // Mouse counts as moving for this many frames after a delta

  // Frame driver
  MAX_FRAME_DELTA: 0.25, // Seconds; longer gaps (tab switch) are clamped
  SLOW_FRAME_MS: 10, // Log a per-kind breakdown above this

  // Player
  PLAYER_SIZE: 128,
  PLAYER_COLLIDER_RADIUS: 32,
  PLAYER_SPEED: 400, // Max speed, pixels per second
  PLAYER_ACCELERATION: 2000, // Pixels per second squared
  PLAYER_HEALTH: 3,
  PLAYER_START_X: 100,
  PLAYER_Z_INDEX: 10,

  // Hands (tethered cursor)
  HAND_RANGE: 100, // Max distance from the player
  HAND_SIZE: 16,
  HAND_Z_INDEX: 100,

  // Dropped items
  DROPPED_EXPIRATION: 5, // Seconds of fade before despawn

  // Ingredients
  INGREDIENT_SIZE: 24,
  INGREDIENT_BIN_SIZE: 56,
  INGREDIENT_Z_INDEX: 20,

  // Stoves
  MAX_STOVES: 5,
  STOVE_SIZE: 64,
  STOVE_BORDER: 4,
  MAX_INGREDIENTS: 8,
  COOKING_TIME: 5, // Seconds
  INGREDIENT_SPIN_SPEED: 0.5, // Revolutions per second
  FLAME_FLICKER_SPEED: 12, // Radians per second
  STOVE_Z_INDEX: 2,

  // Dishes
  DISH_SIZE: 32,
  DISH_Z_INDEX: 15,

  // Customers
  CUSTOMER_SIZE: 64,
  CUSTOMER_SPAWN_TIME: 10, // Seconds between arrivals
  CUSTOMER_WAIT_TIME: 10, // Patience before turning angry
  CUSTOMER_EAT_TIME: 15,
  CUSTOMER_FIRE_TIME: 3, // Seconds between volleys
  CUSTOMER_SAFE_RADIUS: 150, // No firing while the player is this close
  CUSTOMER_DIALOG_OFFSET: 40,
  CUSTOMER_DIALOG_BORDER: 3,
  CUSTOMER_SPREAD_ANGLE: Math.PI / 12, // Fan half-angle for spreaders
  CUSTOMER_BARRAGE_COUNT: 8, // Shots per spinner ring
  CUSTOMER_BARRAGE_STEP: Math.PI / 16, // Ring rotation per volley
  CUSTOMER_Z_INDEX: 5,
  CUSTOMER_DIALOG_Z_INDEX: 50,

  // Seats
  SEAT_SIZE: 40,
  SEAT_OFFSET_X: 16,
  SEAT_OFFSET_Y: 30,
  SEAT_DISH_TARGET_OFFSET: 32,
  SEAT_DISH_TARGET_SIZE: 32,
  SEAT_DISH_TARGET_BORDER: 2,
  SEAT_Z_INDEX: 1,

  // Projectiles
  PROJECTILE_SIZE: 12,
  PROJECTILE_SPEED: 200,
  PROJECTILE_BOUNDS_MARGIN: 100, // Despawn this far outside the playfield
  PROJECTILE_LOB_DISTANCE: 160, // Flies over terrain for this many pixels after launch (clears the table)
  PROJECTILE_Z_INDEX: 30,

  // HUD (queued on top of the scene)
  HUD_Z_INDEX: 110,
  HUD_HEALTH_OFFSET: 48, // From the top-right corner
  HUD_HEALTH_SPACING: 8,
  HUD_HEART_SIZE: 48,
  HUD_HEART_TILT: -0.125 * Math.PI,
  HUD_DIGIT_OFFSET: 48, // From the top-left corner
  HUD_DIGIT_WIDTH: 24,
  HUD_DIGIT_HEIGHT: 40,
  HUD_DIGIT_STROKE: 5,
  HUD_DIGIT_SPACING: 10,

  // Overlays (immediate mode)
  OVERLAY_ALPHA: 0.6,
} as const;

// Texture paths, loaded once per game state
export const ASSET_PATHS = {
  player: '/assets/Little_Guy.png',
  heart: '/assets/Heart.png',
  lobber: '/assets/Customer_Lobber.png',
  spreader: '/assets/Customer_Spreader.png',
  spinner: '/assets/Customer_Spinner.png',
} as const;

export type SpriteName = keyof typeof ASSET_PATHS;

