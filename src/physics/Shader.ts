import { Color } from 'three';
import { Ray } from './types';
import { Scene, validateScene } from './Scene';
import { computeDiffuse } from './Lighting';
import { offsetPoint, reflectVector, sanitizeColor } from './math_solvers';
import { RenderConfig, resolveRenderConfig } from '../state/config';

/** One mirror hit on the way out, waiting for the color of what it reflects. */
interface Bounce {
    base: Color;
    reflectivity: number;
}

/**
 * Turns a ray into a color: diffuse lighting at the nearest hit, blended with
 * the mirror reflection traced from there.
 *
 * The reflection chain is walked iteratively. Each step is in one of three states:
 *   - Miss:          background (terminal)
 *   - Hit, no bounce: diffuse color (terminal; matte or out of depth)
 *   - Hit, bounce:    remember the hit, follow the reflected ray at depth + 1
 * Depth strictly increases and every cap is a finite integer, so a primary ray
 * costs at most maxDepth + 1 scene queries, even between two facing mirrors.
 * The remembered hits are then folded back innermost first.
 */
export class Shader {
    readonly scene: Scene;
    readonly config: RenderConfig;

    constructor(scene: Scene, config: Partial<RenderConfig> = {}) {
        validateScene(scene);
        this.scene = scene;
        this.config = resolveRenderConfig(config);
    }

    shade(ray: Ray, depth: number = 0): Color {
        const { epsilon } = this.config;
        const bounces: Bounce[] = [];

        let current = ray;
        let level = depth;
        let color: Color | null = null;

        while (color === null) {
            const nearest = this.scene.findNearest(current, epsilon);

            // 1. Miss → background, untouched
            if (!nearest) {
                color = this.scene.background.clone();
                break;
            }

            const { object, hit } = nearest;
            const { material } = object;

            // 2. Direct lighting
            const base = computeDiffuse(this.scene, hit.point, hit.normal, material, epsilon);

            // 3. Matte surface, or out of bounces
            const maxDepth = material.maxDepth ?? this.config.maxDepth;
            if (material.reflectivity <= 0 || level >= maxDepth) {
                color = sanitizeColor(base);
                break;
            }

            // 4. Mirror bounce
            bounces.push({ base, reflectivity: material.reflectivity });
            current = {
                origin: offsetPoint(hit.point, hit.normal, epsilon),
                direction: reflectVector(current.direction, hit.normal),
            };
            level++;
        }

        // base·(1 - k) + reflected·k, from the last bounce back to the first
        for (let i = bounces.length - 1; i >= 0; i--) {
            const { base, reflectivity } = bounces[i];
            color = sanitizeColor(base.lerp(color, reflectivity));
        }
        return color;
    }
}
