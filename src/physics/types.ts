import { Color, Vector3 } from 'three';

// --- Coordinate System ---
// World Space: Right-handed, Y-up. The camera sits at the origin looking down -Z.
// Vector3 values are shared freely between rays, hits and scene data, so nothing
// in the pipeline mutates one in place: clone first, then use three's chained ops.

export interface Ray {
    origin: Vector3;    // World Position
    direction: Vector3; // World Direction (unit length by convention, not enforced)
}

export interface HitRecord {
    t: number;          // Distance along ray (>= epsilon)
    point: Vector3;     // World Hit Point
    normal: Vector3;    // Unit normal, oriented against the incoming ray
}

export interface Material {
    color: Color;          // Diffuse color, channels in [0, 1]
    reflectivity: number;  // 0 = matte, 1 = perfect mirror
    maxDepth?: number;     // Per-material reflection cap (overrides the render-wide one)
}

export interface Camera {
    width: number;  // Image width [px]
    height: number; // Image height [px]
    fov: number;    // Vertical field of view [degrees], in (0, 180)
}

export function createRay(origin: Vector3, direction: Vector3): Ray {
    return { origin: origin.clone(), direction: direction.clone() };
}

export function createMaterial(color: Color, reflectivity: number = 0, maxDepth?: number): Material {
    const material: Material = { color: color.clone(), reflectivity };
    if (maxDepth !== undefined) material.maxDepth = maxDepth;
    return material;
}
