/** Fixed simulation tick rate in Hz. */
export const TICK_RATE = 20;

/** Seconds per simulation tick. */
export const TICK_SECONDS = 1 / TICK_RATE;

// ── World layout ──

/** Blocks per chunk column side. */
export const CHUNK_SIZE = 16;

/** Blocks per vertical chunk section. */
export const SECTION_HEIGHT = 16;

/** Build height; block rows at or above this read as air. */
export const WORLD_HEIGHT = 256;

/** Sections per chunk column. */
export const SECTIONS_PER_COLUMN = WORLD_HEIGHT / SECTION_HEIGHT;

/** Blocks stored per section (16×16×16). */
export const SECTION_VOLUME = CHUNK_SIZE * CHUNK_SIZE * SECTION_HEIGHT;

// ── Player hitbox ──

/** Half the width of the player's collision box. */
export const PLAYER_HALF_WIDTH = 0.3;

/** Height of the player's collision box. */
export const PLAYER_HEIGHT = 1.8;

/** Largest ledge the player walks up without jumping. */
export const STEP_HEIGHT = 0.6;

/** Slack applied to block-range rounding so touching faces don't count. */
export const COLLISION_EPS = 1e-5;

// ── Ground and air movement (per tick, not per second) ──

export const GRAVITY = -0.08;
export const AIR_DRAG = 0.98;
export const JUMP_VELOCITY = 0.42;

/** Extra jump velocity per jump-boost level. */
export const JUMP_BOOST_PER_LEVEL = 0.1;

/** Horizontal boost along facing when jumping while sprinting. */
export const SPRINT_JUMP_BOOST = 0.2;

export const BASE_MOVE_SPEED = 0.1;
export const SPEED_IN_AIR = 0.02;
export const SPRINT_MULTIPLIER = 1.3;

/** Speed effect adds this fraction per level on top of 1.0. */
export const SPEED_EFFECT_PER_LEVEL = 0.2;

/** Default block slipperiness; ice and slime are out of scope. */
export const SLIPPERINESS_DEFAULT = 0.6;

/** Horizontal friction while airborne. */
export const AIR_FRICTION = 0.91;

/** Numerator of the ground acceleration term (0.6·0.91)³. */
export const GROUND_ACCEL_BASE = 0.16277136;

export const MOVE_INPUT_DAMPING = 0.98;
export const SNEAK_INPUT_SCALE = 0.3;
export const SNEAK_EDGE_STEP = 0.05;

/** Forward input needed to start or hold a sprint. */
export const SPRINT_FORWARD_THRESHOLD = 0.8;

// ── Water ──

export const WATER_GRAVITY = -0.02;
export const WATER_DRAG = 0.8;
export const WATER_MOVE_SPEED = 0.02;
export const WATER_SWIM_UP = 0.04;
export const WATER_SURFACE_ASSIST = 0.3;

/** Heights above the feet sampled for water. */
export const LIQUID_SAMPLE_OFFSETS: readonly number[] = [0.2, 0.9, 1.4];

// ── Creative flight ──

export const DEFAULT_FLYING_SPEED = 0.05;
export const FLY_VERTICAL_MULTIPLIER = 3.0;
export const FLY_HORIZONTAL_DAMPING = 0.91;
export const FLY_VERTICAL_DAMPING = 0.6;
export const FLY_SPRINT_MULTIPLIER = 2.0;

/** A second jump press within this many ticks toggles flight. */
export const FLY_TOGGLE_WINDOW_TICKS = 7;

// ── Prediction and reconciliation ──

/** Predicted frames kept for replay. */
export const PREDICTION_CAPACITY = 512;

/** Positional errors below this are noise and never corrected. */
export const RECONCILE_EPSILON = 0.001;

/** Positional errors at or above this discard prediction and snap. */
export const HARD_TELEPORT_DISTANCE = 3.0;

/** Per-20Hz-frame decay of the render-only correction offset. */
export const SMOOTHING_DECAY = 0.15;

// ── Movement packets ──

/** Squared distance that counts as having moved (vanilla 9e-4). */
export const POSITION_DELTA_SQ_EPS = 0.0009;

/** Force a position packet after this many ticks without one. */
export const POSITION_RESEND_TICKS = 20;

/** Smallest yaw/pitch change (degrees) that counts as a rotation. */
export const ROTATION_EPS_DEG = 0.001;
