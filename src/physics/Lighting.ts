import { Color, Vector3 } from 'three';
import { Material } from './types';
import { Scene } from './Scene';
import { Light, sampleLight } from './lights';
import { offsetPoint, sanitizeColor } from './math_solvers';

/**
 * Contribution of one light at a surface point:
 *   material.color × light radiance × max(0, N·L)
 * or black when the point faces away or something blocks the light.
 */
export function lightContribution(
    scene: Scene,
    light: Light,
    point: Vector3,
    normal: Vector3,
    material: Material,
    epsilon: number
): Color {
    const sample = sampleLight(light, point);
    const lambert = Math.max(0, normal.dot(sample.direction));
    if (lambert === 0) return new Color(0, 0, 0); // Back-facing

    // Shadow ray starts just above the surface so it can't re-hit it
    const shadowRay = {
        origin: offsetPoint(point, normal, epsilon),
        direction: sample.direction,
    };
    if (scene.isOccluded(shadowRay, sample.distance, epsilon)) {
        return new Color(0, 0, 0);
    }

    return material.color.clone().multiply(sample.radiance).multiplyScalar(lambert);
}

/** Sum of every light's diffuse contribution, each channel clamped to [0, 1]. */
export function computeDiffuse(
    scene: Scene,
    point: Vector3,
    normal: Vector3,
    material: Material,
    epsilon: number
): Color {
    const total = new Color(0, 0, 0);
    for (const light of scene.lights) {
        total.add(lightContribution(scene, light, point, normal, material, epsilon));
    }
    return sanitizeColor(total);
}
