import { Color, Vector3 } from 'three';
import { normalizeSafe } from './math_solvers';

/**
 * How a point light's intensity changes with distance.
 *   - 'none':          constant intensity at any distance (simple lamp, the default)
 *   - 'inverseSquare': intensity / (4π d²), a physically scaled isotropic emitter
 */
export type Falloff = 'none' | 'inverseSquare';

export const FALLOFF_MODES: readonly Falloff[] = ['none', 'inverseSquare'];

export interface PointLight {
    kind: 'point';
    position: Vector3;
    color: Color;
    intensity: number;
    falloff: Falloff;
}

export interface DirectionalLight {
    kind: 'directional';
    direction: Vector3; // Direction the light travels (from the light toward the scene)
    color: Color;
    intensity: number;
}

export type Light = PointLight | DirectionalLight;

/** What a single light delivers to a surface point, before shadowing. */
export interface LightSample {
    direction: Vector3; // Unit vector from the point toward the light
    distance: number;   // Distance to the light (Infinity for directional lights)
    radiance: Color;    // color × intensity × falloff
}

export function createPointLight(
    position: Vector3,
    color: Color = new Color(1, 1, 1),
    intensity: number = 1,
    falloff: Falloff = 'none'
): PointLight {
    return { kind: 'point', position: position.clone(), color: color.clone(), intensity, falloff };
}

export function createDirectionalLight(
    direction: Vector3,
    color: Color = new Color(1, 1, 1),
    intensity: number = 1
): DirectionalLight {
    return { kind: 'directional', direction: direction.clone(), color: color.clone(), intensity };
}

export function isFalloff(value: string): value is Falloff {
    return FALLOFF_MODES.some(mode => mode === value);
}

export function sampleLight(light: Light, point: Vector3): LightSample {
    switch (light.kind) {
        case 'point': {
            const toLight = light.position.clone().sub(point);
            const distance = toLight.length();
            let brightness = light.intensity;
            if (light.falloff === 'inverseSquare') {
                brightness = distance > 0 ? light.intensity / (4 * Math.PI * distance * distance) : 0;
            }
            return {
                direction: normalizeSafe(toLight),
                distance,
                radiance: light.color.clone().multiplyScalar(brightness),
            };
        }
        case 'directional':
            return {
                direction: normalizeSafe(light.direction.clone().negate()),
                distance: Infinity,
                radiance: light.color.clone().multiplyScalar(light.intensity),
            };
        default: {
            const unreachable: never = light;
            throw new Error(`Unknown light: ${JSON.stringify(unreachable)}`);
        }
    }
}
