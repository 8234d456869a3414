/**
 * Vector Types
 *
 * 3D vectors as plain float records. Functions never mutate their inputs.
 */

// ============================================
// Scalars
// ============================================

export function clamp01(t: number): number {
    return t < 0 ? 0 : t > 1 ? 1 : t;
}

export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}

// ============================================
// 3D Vector
// ============================================

export interface Vec3 {
    x: number;
    y: number;
    z: number;
}

export function vec3(x: number, y: number, z: number): Vec3 {
    return { x, y, z };
}

export function vec3Zero(): Vec3 {
    return { x: 0, y: 0, z: 0 };
}

export function vec3Clone(v: Vec3): Vec3 {
    return { x: v.x, y: v.y, z: v.z };
}

export function vec3Add(a: Vec3, b: Vec3): Vec3 {
    return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function vec3Sub(a: Vec3, b: Vec3): Vec3 {
    return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function vec3Scale(v: Vec3, s: number): Vec3 {
    return { x: v.x * s, y: v.y * s, z: v.z * s };
}

export function vec3Length(v: Vec3): number {
    return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

export function vec3Normalize(v: Vec3): Vec3 {
    const len = vec3Length(v);
    if (len === 0) return vec3Zero();
    return { x: v.x / len, y: v.y / len, z: v.z / len };
}

export function vec3Lerp(a: Vec3, b: Vec3, t: number): Vec3 {
    return {
        x: lerp(a.x, b.x, t),
        y: lerp(a.y, b.y, t),
        z: lerp(a.z, b.z, t)
    };
}

export function vec3Distance(a: Vec3, b: Vec3): number {
    return vec3Length(vec3Sub(b, a));
}

/** Distance on the horizontal (x, z) plane, ignoring height */
export function vec3PlanarDistance(a: Vec3, b: Vec3): number {
    const dx = b.x - a.x;
    const dz = b.z - a.z;
    return Math.sqrt(dx * dx + dz * dz);
}

export function vec3Equals(a: Vec3, b: Vec3): boolean {
    return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function vec3IsFinite(v: Vec3): boolean {
    return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}
