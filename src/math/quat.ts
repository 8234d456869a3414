/**
 * Quaternion Operations
 *
 * Unit quaternions for 3D rotations, stored as plain float records.
 */

import { Vec3, vec3Normalize } from './vec';

// ============================================
// Quaternion
// ============================================

export interface Quat {
    x: number;
    y: number;
    z: number;
    w: number;
}

export function quatIdentity(): Quat {
    return { x: 0, y: 0, z: 0, w: 1 };
}

export function quatFromAxisAngle(axis: Vec3, angle: number): Quat {
    const half = angle / 2;
    const s = Math.sin(half);
    const normAxis = vec3Normalize(axis);
    return {
        x: normAxis.x * s,
        y: normAxis.y * s,
        z: normAxis.z * s,
        w: Math.cos(half)
    };
}

export function quatFromEulerY(yaw: number): Quat {
    const half = yaw / 2;
    return { x: 0, y: Math.sin(half), z: 0, w: Math.cos(half) };
}

export function quatDot(a: Quat, b: Quat): number {
    return a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w;
}

export function quatNormalize(q: Quat): Quat {
    const len = Math.sqrt(quatDot(q, q));
    if (len === 0) return quatIdentity();
    return { x: q.x / len, y: q.y / len, z: q.z / len, w: q.w / len };
}

/** Clone a quaternion */
export function quatClone(q: Quat): Quat {
    return { x: q.x, y: q.y, z: q.z, w: q.w };
}

/**
 * Angle in radians between two rotations (0..PI).
 */
export function quatAngle(a: Quat, b: Quat): number {
    const d = Math.min(1, Math.abs(quatDot(quatNormalize(a), quatNormalize(b))));
    return 2 * Math.acos(d);
}

/**
 * Spherical interpolation along the shortest arc, t clamped to [0, 1].
 */
export function quatSlerp(a: Quat, b: Quat, t: number): Quat {
    if (t <= 0) return quatClone(a);
    if (t >= 1) return quatClone(b);

    let bx = b.x, by = b.y, bz = b.z, bw = b.w;
    let cosHalf = quatDot(a, b);

    // q and -q are the same rotation; take the short way round
    if (cosHalf < 0) {
        bx = -bx; by = -by; bz = -bz; bw = -bw;
        cosHalf = -cosHalf;
    }

    // Nearly parallel: fall back to normalized lerp
    if (cosHalf > 0.9995) {
        return quatNormalize({
            x: a.x + (bx - a.x) * t,
            y: a.y + (by - a.y) * t,
            z: a.z + (bz - a.z) * t,
            w: a.w + (bw - a.w) * t
        });
    }

    const halfAngle = Math.acos(cosHalf);
    const sinHalf = Math.sqrt(1 - cosHalf * cosHalf);
    const ra = Math.sin((1 - t) * halfAngle) / sinHalf;
    const rb = Math.sin(t * halfAngle) / sinHalf;

    return {
        x: a.x * ra + bx * rb,
        y: a.y * ra + by * rb,
        z: a.z * ra + bz * rb,
        w: a.w * ra + bw * rb
    };
}

export function quatIsFinite(q: Quat): boolean {
    return Number.isFinite(q.x) && Number.isFinite(q.y) && Number.isFinite(q.z) && Number.isFinite(q.w);
}
