/**
 * Motion estimate for replicas, derived from successive presented positions.
 * Animation code reads it in place of a locally simulated velocity.
 */

import { Vec3, vec3Clone, vec3PlanarDistance } from '../math';

export interface MotionConfig {
    /** Response rate of the speed filter (1/s) */
    motionSmoothing: number;
    /** Speeds below this read as 0 */
    motionIdleSpeed: number;
    /** Speeds above this read as moving */
    motionMovingSpeed: number;
}

export interface MotionSample {
    /** Smoothed planar speed (units/s) */
    speed: number;
    moving: boolean;
}

export class MotionEstimator {
    private lastPosition: Vec3 | null = null;
    private _speed: number = 0;

    constructor(private readonly config: MotionConfig) {}

    get sample(): MotionSample {
        return { speed: this._speed, moving: this._speed > this.config.motionMovingSpeed };
    }

    update(position: Vec3, dt: number): MotionSample {
        if (this.lastPosition && dt > 0) {
            const raw = vec3PlanarDistance(this.lastPosition, position) / dt;
            this._speed += (raw - this._speed) * Math.min(1, dt * this.config.motionSmoothing);
            if (this._speed < this.config.motionIdleSpeed) this._speed = 0;
        }
        this.lastPosition = vec3Clone(position);
        return this.sample;
    }

    reset(): void {
        this.lastPosition = null;
        this._speed = 0;
    }
}
