import { Color } from 'three';
import { v4 as uuidv4 } from 'uuid';
import { Camera, HitRecord, Material, Ray } from './types';
import { Shape, intersectShape } from './Shape';
import { Light } from './lights';
import { SceneValidationError } from './errors';
import { DEFAULT_RENDER_CONFIG } from '../state/config';

export interface SceneObject {
    id: string;
    name: string;
    shape: Shape;
    material: Material;
}

export interface SceneHit {
    object: SceneObject;
    hit: HitRecord;
}

export function createSceneObject(shape: Shape, material: Material, name: string = "Unnamed Object"): SceneObject {
    return { id: uuidv4(), name, shape, material };
}

/**
 * Everything the renderer needs for one frame. Built once, then only read:
 * every pixel, row band and worker shares the same instance.
 */
export class Scene {
    readonly camera: Readonly<Camera>;
    readonly background: Color;
    readonly objects: readonly SceneObject[];
    readonly lights: readonly Light[];

    constructor(camera: Camera, background: Color, objects: SceneObject[] = [], lights: Light[] = []) {
        this.camera = { ...camera };
        this.background = background.clone();
        this.objects = [...objects];
        this.lights = [...lights];
    }

    /**
     * Nearest object along the ray with epsilon <= t < maxDistance.
     * Equal distances go to whichever object comes first in `objects`.
     */
    findNearest(ray: Ray, epsilon: number = DEFAULT_RENDER_CONFIG.epsilon, maxDistance: number = Infinity): SceneHit | null {
        let nearestT = maxDistance;
        let nearest: SceneHit | null = null;

        for (const object of this.objects) {
            const hit = intersectShape(object.shape, ray, epsilon);

            // Strict '<' keeps the first of two equidistant objects
            if (hit && hit.t < nearestT) {
                nearestT = hit.t;
                nearest = { object, hit };
            }
        }

        return nearest;
    }

    /** Shadow query: is anything in the way before maxDistance? */
    isOccluded(ray: Ray, maxDistance: number, epsilon: number = DEFAULT_RENDER_CONFIG.epsilon): boolean {
        return this.findNearest(ray, epsilon, maxDistance) !== null;
    }
}

/** Rejects scenes that can't produce a well-defined image. */
export function validateScene(scene: Scene): void {
    const { width, height, fov } = scene.camera;

    if (!Number.isInteger(width) || width <= 0) {
        throw new SceneValidationError('camera.width', `expected a positive integer, got ${width}`);
    }
    if (!Number.isInteger(height) || height <= 0) {
        throw new SceneValidationError('camera.height', `expected a positive integer, got ${height}`);
    }
    if (!Number.isFinite(fov) || fov <= 0 || fov >= 180) {
        throw new SceneValidationError('camera.fov', `expected degrees in (0, 180), got ${fov}`);
    }

    const bg = scene.background;
    if (!Number.isFinite(bg.r) || !Number.isFinite(bg.g) || !Number.isFinite(bg.b)) {
        throw new SceneValidationError('background', 'color channels must be finite');
    }

    scene.objects.forEach(({ material }, i) => {
        const { reflectivity, maxDepth } = material;
        if (!Number.isFinite(reflectivity) || reflectivity < 0 || reflectivity > 1) {
            throw new SceneValidationError(`objects[${i}].material.reflectivity`, `expected a number in [0, 1], got ${reflectivity}`);
        }
        if (maxDepth !== undefined && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
            throw new SceneValidationError(`objects[${i}].material.maxDepth`, `expected a non-negative integer, got ${maxDepth}`);
        }
    });
}
