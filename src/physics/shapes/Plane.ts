import { Vector3 } from 'three';
import { Ray, HitRecord } from '../types';
import { normalizeSafe, pointAt } from '../math_solvers';

/** Rays closer than this to parallel with the plane never hit it. */
const PARALLEL_TOLERANCE = 1e-9;

export interface Plane {
    kind: 'plane';
    point: Vector3;
    normal: Vector3; // Unit length; zero means the plane is degenerate
}

export function createPlane(point: Vector3, normal: Vector3): Plane {
    // Leave already-unit normals bit-for-bit alone so a saved scene reloads identically
    const unit = Math.abs(normal.length() - 1) < 1e-12 ? normal.clone() : normalizeSafe(normal);
    return { kind: 'plane', point: point.clone(), normal: unit };
}

export function intersectPlane(plane: Plane, ray: Ray, epsilon: number): HitRecord | null {
    const denom = ray.direction.dot(plane.normal);
    if (Math.abs(denom) < PARALLEL_TOLERANCE) return null; // Parallel, or zero normal

    const t = plane.point.clone().sub(ray.origin).dot(plane.normal) / denom;
    if (!Number.isFinite(t) || t < epsilon) return null;

    // Two-sided: report whichever side the ray arrives from
    const normal = denom < 0 ? plane.normal.clone() : plane.normal.clone().negate();

    return { t, point: pointAt(ray, t), normal };
}
