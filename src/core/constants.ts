/**
 * Core Constants
 */

/**
 * Maximum number of concurrently replicated entities per world.
 */
export const MAX_ENTITIES = 4096;

/**
 * Entity ID format: [12 bits generation][20 bits index]
 * - Generation: Prevents a recycled ID from matching a stale network message
 * - Index: Slot in the allocator
 */
export const GENERATION_BITS = 12;
export const INDEX_BITS = 20;
export const INDEX_MASK = (1 << INDEX_BITS) - 1;
export const MAX_GENERATION = (1 << GENERATION_BITS) - 1;

/**
 * System execution phases (in order).
 *
 * - input: late-arriving work queued for the start of the tick
 * - prePhysics: guard-pre runs here, before any local integration
 * - update: authority simulation (Behavior Controller) and local movers
 * - physics: physics integration
 * - postPhysics: replica reconciliation
 * - late: animation / root motion; guard-post runs last, then snapshots are published
 * - render: presentation (skipped when headless)
 */
export const SYSTEM_PHASES = ['input', 'prePhysics', 'update', 'physics', 'postPhysics', 'late', 'render'] as const;
export type SystemPhase = typeof SYSTEM_PHASES[number];

/** Order of the guard-pre system inside 'prePhysics' */
export const GUARD_PRE_ORDER = -1000;

/** Order of the guard-post system inside 'late' */
export const GUARD_POST_ORDER = 1000;

/** Order of snapshot publishing inside 'late' (after guard-post) */
export const PUBLISH_ORDER = 2000;
