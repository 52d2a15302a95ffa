/**
 * sheetmotion - Constants
 * All default values and magic numbers in one place
 */

// =============================================================================
// Animation
// =============================================================================

/** Default duration of `animateTo` in milliseconds */
export const DEFAULT_ANIMATION_DURATION = 300;

/** Fallback frame interval when requestAnimationFrame is unavailable (ms) */
export const FALLBACK_FRAME_INTERVAL = 16;

// =============================================================================
// Physics
// =============================================================================

/** Default spring used to settle the sheet */
export const DEFAULT_SPRING_MASS = 0.5;
export const DEFAULT_SPRING_STIFFNESS = 100;

/**
 * Default damping ratio (1 = critically damped).
 * Slightly above 1 so the sheet never visibly overshoots a snap point.
 */
export const DEFAULT_SPRING_DAMPING_RATIO = 1.1;

/**
 * Friction drag coefficient for free flings.
 * Fraction of velocity retained after one second.
 */
export const DEFAULT_FRICTION_DRAG = 0.135;

/**
 * Minimum fling speed (px/s) that moves the sheet to the next snap point
 * instead of the nearest one.
 */
export const DEFAULT_MIN_FLING_SPEED = 50;

/** Speed (px/s) below which a ballistic request is treated as a release */
export const DEFAULT_MIN_BALLISTIC_SPEED = 1;

/** Distance and velocity tolerance for a simulation to count as finished */
export const DEFAULT_TOLERANCE_DISTANCE = 1e-3;
export const DEFAULT_TOLERANCE_VELOCITY = 1e-3;

/**
 * Two offsets closer than this are considered the same position.
 * Used when deciding whether the sheet already rests on a snap point.
 */
export const OFFSET_EPSILON = 0.01;

// =============================================================================
// Logging
// =============================================================================

/** Prefix of every log line and contract violation message */
export const LOG_PREFIX = "sheetmotion";
