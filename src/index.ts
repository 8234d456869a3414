/**
 * Authority Sync - authority/replica replication for hostile entities
 *
 * Features:
 * - One authority simulates each entity; replicas reconcile toward snapshots
 * - Single-writer snapshot channel with an untagged binary tuple
 * - Authority guard bracketing local physics and animation writes
 * - Damage forwarded to the authority, applied exactly once
 * - Loopback and `ws` transports
 */

// ============================================
// Math
// ============================================
export * from './math';

// ============================================
// Core (world, scheduling, ids)
// ============================================
export * from './core';

// ============================================
// Sync (replication primitives)
// ============================================
export * from './sync';

// ============================================
// Entity
// ============================================
export * from './entity';

// ============================================
// Net (transports)
// ============================================
export * from './net';
