/**
 * Per-entity replication tuning.
 */

import type { ReconcileConfig } from './reconcile';
import type { MotionConfig } from './motion';

export interface SyncConfig extends ReconcileConfig, MotionConfig {
    /** Health at (re)activation */
    maxHealth: number;

    /** Seconds between death and the authority's teardown */
    deathTeardownSeconds: number;

    /** Authority tears the entity down when it falls below this height */
    killPlaneY: number;

    /** Channel re-check sweeps (replicas also re-freeze), seconds after start */
    sweepScheduleSeconds: readonly number[];

    /** Log observer lists, first sync and sweep results */
    debug: boolean;
}

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
    positionLerpRate: 10,
    rotationLerpRate: 10,
    snapDistance: 5,
    maxHealth: 100,
    deathTeardownSeconds: 3,
    killPlaneY: -50,
    sweepScheduleSeconds: [0.5, 1.5, 3.0],
    motionSmoothing: 8,
    motionIdleSpeed: 0.05,
    motionMovingSpeed: 0.1,
    debug: false
};
