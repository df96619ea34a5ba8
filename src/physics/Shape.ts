import { Ray, HitRecord } from './types';
import { Sphere, intersectSphere } from './shapes/Sphere';
import { Plane, intersectPlane } from './shapes/Plane';

export type { Sphere } from './shapes/Sphere';
export type { Plane } from './shapes/Plane';
export { createSphere } from './shapes/Sphere';
export { createPlane } from './shapes/Plane';

/** Closed set of intersectable primitives, dispatched on `kind`. */
export type Shape = Sphere | Plane;

export type ShapeKind = Shape['kind'];

export function intersectShape(shape: Shape, ray: Ray, epsilon: number): HitRecord | null {
    switch (shape.kind) {
        case 'sphere':
            return intersectSphere(shape, ray, epsilon);
        case 'plane':
            return intersectPlane(shape, ray, epsilon);
        default: {
            const unreachable: never = shape;
            throw new Error(`Unknown shape: ${JSON.stringify(unreachable)}`);
        }
    }
}
