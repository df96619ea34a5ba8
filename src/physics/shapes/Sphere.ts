import { Vector3 } from 'three';
import { Ray, HitRecord } from '../types';
import { pointAt, solveQuadratic } from '../math_solvers';

export interface Sphere {
    kind: 'sphere';
    center: Vector3;
    radius: number;
}

export function createSphere(center: Vector3, radius: number): Sphere {
    return { kind: 'sphere', center: center.clone(), radius };
}

export function intersectSphere(sphere: Sphere, ray: Ray, epsilon: number): HitRecord | null {
    const r = sphere.radius;
    if (!(r > 0) || !Number.isFinite(r)) return null; // Degenerate: never hit

    // |O + tD - C|^2 = r^2  →  (D.D)t^2 + 2(OC.D)t + (OC.OC - r^2) = 0
    const oc = ray.origin.clone().sub(sphere.center);
    const A = ray.direction.dot(ray.direction);
    const B = 2 * oc.dot(ray.direction);
    const C = oc.dot(oc) - r * r;

    // Roots come back sorted, so the first one past epsilon is the nearest
    const t = solveQuadratic(A, B, C).find(root => root >= epsilon && Number.isFinite(root));
    if (t === undefined) return null;

    const point = pointAt(ray, t);
    const normal = point.clone().sub(sphere.center).divideScalar(r);

    // Ray started inside the sphere: face the normal back at it
    if (normal.dot(ray.direction) > 0) normal.negate();

    return { t, point, normal };
}
