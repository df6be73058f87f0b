import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';

export const UP: Vec3 = [0, 1, 0];

export const degreesToRadians = (degrees: number): number => (degrees * Math.PI) / 180;

export const radiansToDegrees = (radians: number): number => (radians * 180) / Math.PI;

/**
 * Rotates a vector around the world up axis.
 * A positive yaw turns +x towards -z.
 */
export const rotateYaw = (out: Vec3, v: Vec3, yaw: number): Vec3 => {
    const cos = Math.cos(yaw);
    const sin = Math.sin(yaw);
    const x = v[0];
    const z = v[2];

    out[0] = x * cos + z * sin;
    out[1] = v[1];
    out[2] = -x * sin + z * cos;

    return out;
};

/** Angle between two vectors, in degrees */
export const angleBetween = (a: Vec3, b: Vec3): number => {
    const lengths = vec3.length(a) * vec3.length(b);
    if (lengths === 0) return 0;

    const cos = Math.min(1, Math.max(-1, vec3.dot(a, b) / lengths));

    return radiansToDegrees(Math.acos(cos));
};

export const horizontalDistance = (a: Vec3, b: Vec3): number => {
    const dx = b[0] - a[0];
    const dz = b[2] - a[2];
    return Math.sqrt(dx * dx + dz * dz);
};

/**
 * Maps a loop counter to offsets that walk outwards from zero instead of incrementally.
 * 0 1 2 3 4 5 6 -> 0 1 -1 2 -2 3 -3
 */
export const spiralPattern = (input: number): number => {
    const halfInput = Math.ceil(input / 2);
    const sign = input % 2 === 0 ? -1 : 1;

    return halfInput * sign || 0;
};

/** Height reached at the apex of a jump with the given initial vertical speed */
export const parabolaMaxHeight = (verticalSpeed: number, gravity: number): number => {
    return (verticalSpeed * verticalSpeed) / (2 * gravity);
};

/**
 * Height of a projectile relative to its launch point after travelling the given horizontal distance.
 * y = vy * t - 0.5 * g * t^2, with t = horizontalOffset / horizontalSpeed
 */
export const parabolaHeight = (
    horizontalOffset: number,
    horizontalSpeed: number,
    verticalSpeed: number,
    gravity: number,
): number => {
    const time = horizontalOffset / horizontalSpeed;
    return verticalSpeed * time - 0.5 * gravity * time * time;
};
