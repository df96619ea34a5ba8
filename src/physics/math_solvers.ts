import { Color, Vector3 } from 'three';
import { Ray } from './types';

/** Below this length a vector is treated as zero and has no direction. */
export const ZERO_LENGTH = 1e-12;

/**
 * Unit vector along v, or the zero vector when v has (almost) no length.
 * Never returns NaN components.
 */
export function normalizeSafe(v: Vector3): Vector3 {
    const len = v.length();
    if (!Number.isFinite(len) || len < ZERO_LENGTH) return new Vector3(0, 0, 0);
    return v.clone().divideScalar(len);
}

/**
 * Calculates the reflection vector using R = I - 2(N.I)N
 * The result keeps the length of the incident vector; it is not renormalized.
 */
export function reflectVector(incident: Vector3, normal: Vector3): Vector3 {
    return incident.clone().sub(
        normal.clone().multiplyScalar(2 * incident.dot(normal))
    );
}

/** p(t) = origin + t * direction */
export function pointAt(ray: Ray, t: number): Vector3 {
    return ray.origin.clone().add(ray.direction.clone().multiplyScalar(t));
}

/** Nudges a surface point off the surface so secondary rays don't re-hit it. */
export function offsetPoint(point: Vector3, normal: Vector3, epsilon: number): Vector3 {
    return point.clone().add(normal.clone().multiplyScalar(epsilon));
}

export function isFiniteVector(v: Vector3): boolean {
    return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

/**
 * Solves Quadratic Equation At^2 + Bt + C = 0
 * Returns sorted real roots.
 */
export function solveQuadratic(A: number, B: number, C: number): number[] {
    if (A === 0) return [];

    const disc = B * B - 4 * A * C;
    if (disc < 0 || Number.isNaN(disc)) return [];

    if (disc === 0) return [-B / (2 * A)];

    const sqrtDisc = Math.sqrt(disc);
    const t0 = (-B - sqrtDisc) / (2 * A);
    const t1 = (-B + sqrtDisc) / (2 * A);

    return [Math.min(t0, t1), Math.max(t0, t1)];
}

export function clamp(x: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, x));
}

/** Clamps every channel to [0, 1]; NaN and ±Infinity collapse to 0. In place. */
export function sanitizeColor(color: Color): Color {
    color.r = Number.isFinite(color.r) ? clamp(color.r, 0, 1) : 0;
    color.g = Number.isFinite(color.g) ? clamp(color.g, 0, 1) : 0;
    color.b = Number.isFinite(color.b) ? clamp(color.b, 0, 1) : 0;
    return color;
}
