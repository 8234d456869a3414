/**
 * Math Module
 *
 * Float vector and quaternion helpers for transforms.
 */

// Scalars and 3D vectors
export {
    clamp01,
    lerp,
    vec3,
    vec3Zero,
    vec3Clone,
    vec3Add,
    vec3Sub,
    vec3Scale,
    vec3Length,
    vec3Normalize,
    vec3Lerp,
    vec3Distance,
    vec3PlanarDistance,
    vec3Equals,
    vec3IsFinite
} from './vec';
export type { Vec3 } from './vec';

// Quaternions
export {
    quatIdentity,
    quatFromAxisAngle,
    quatFromEulerY,
    quatDot,
    quatNormalize,
    quatClone,
    quatAngle,
    quatSlerp,
    quatIsFinite
} from './quat';
export type { Quat } from './quat';

// Transforms
export { transformClone } from './transform';
export type { Transform } from './transform';
