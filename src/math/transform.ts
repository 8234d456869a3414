import { Vec3, vec3Clone } from './vec';
import { Quat, quatClone } from './quat';

export interface Transform {
    position: Vec3;
    rotation: Quat;
}

export function transformClone(t: Transform): Transform {
    return { position: vec3Clone(t.position), rotation: quatClone(t.rotation) };
}
