import type { Quat, Vec3 } from "../../protocol/messages/types";

/**
 * @description
 * Performs linear interpolation between two values.
 *
 * When t = 0 the result equals the start value; when t = 1 it equals the end
 * value. The factor is not clamped, so values outside [0, 1] extrapolate.
 *
 * @example
 * ```typescript
 * lerp(0, 100, 0.5);   // 50
 * lerp(0, 100, 1.5);   // 150
 * ```
 */
export function lerp(start: number, end: number, t: number): number {
  return start + (end - start) * t;
}

export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/**
 * Component-wise {@link lerp} for vectors.
 */
export function lerpVec3(a: Vec3, b: Vec3, t: number): Vec3 {
  return { x: lerp(a.x, b.x, t), y: lerp(a.y, b.y, t), z: lerp(a.z, b.z, t) };
}

export function distanceVec3(a: Vec3, b: Vec3): number {
  return Math.hypot(b.x - a.x, b.y - a.y, b.z - a.z);
}

/**
 * a + b * scale
 */
export function addScaledVec3(a: Vec3, b: Vec3, scale: number): Vec3 {
  return { x: a.x + b.x * scale, y: a.y + b.y * scale, z: a.z + b.z * scale };
}

function normalizeQuat(q: Quat): Quat {
  const len = Math.hypot(q.x, q.y, q.z, q.w);
  if (len === 0) return { x: 0, y: 0, z: 0, w: 1 };
  return { x: q.x / len, y: q.y / len, z: q.z / len, w: q.w / len };
}

/**
 * @description
 * Spherical linear interpolation between two rotations.
 *
 * Takes the shortest arc (negating `b` when the quaternions lie in opposite
 * hemispheres) and falls back to a normalized lerp when they are nearly
 * parallel, where the slerp weights become numerically unstable.
 *
 * @param t - Interpolation factor, clamped to [0, 1]
 * @returns A unit quaternion
 */
export function slerpQuat(a: Quat, b: Quat, t: number): Quat {
  const k = clamp(t, 0, 1);
  let bx = b.x, by = b.y, bz = b.z, bw = b.w;
  let cos = a.x * bx + a.y * by + a.z * bz + a.w * bw;

  if (cos < 0) {
    cos = -cos;
    bx = -bx; by = -by; bz = -bz; bw = -bw;
  }

  if (cos > 0.9995) {
    return normalizeQuat({
      x: lerp(a.x, bx, k),
      y: lerp(a.y, by, k),
      z: lerp(a.z, bz, k),
      w: lerp(a.w, bw, k),
    });
  }

  const theta = Math.acos(cos);
  const sin = Math.sin(theta);
  const wa = Math.sin((1 - k) * theta) / sin;
  const wb = Math.sin(k * theta) / sin;

  return normalizeQuat({
    x: a.x * wa + bx * wb,
    y: a.y * wa + by * wb,
    z: a.z * wa + bz * wb,
    w: a.w * wa + bw * wb,
  });
}
