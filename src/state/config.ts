import { SceneValidationError } from '../physics/errors';

// --- Render Settings ---
export interface RenderConfig {
    maxDepth: number; // Reflection bounces allowed after the primary hit
    epsilon: number;  // Minimum hit distance / secondary ray offset (shadow acne guard)
    workers: number;  // Worker threads used by RenderPool (1 = main thread only)
}

export const DEFAULT_RENDER_CONFIG: Readonly<RenderConfig> = Object.freeze({
    maxDepth: 3,
    epsilon: 1e-4,
    workers: 1,
});

/** Merges overrides onto the defaults and rejects values the renderer can't honor. */
export function resolveRenderConfig(overrides: Partial<RenderConfig> = {}): RenderConfig {
    const config: RenderConfig = {
        maxDepth: overrides.maxDepth ?? DEFAULT_RENDER_CONFIG.maxDepth,
        epsilon: overrides.epsilon ?? DEFAULT_RENDER_CONFIG.epsilon,
        workers: overrides.workers ?? DEFAULT_RENDER_CONFIG.workers,
    };

    if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
        throw new SceneValidationError('maxDepth', `expected a non-negative integer, got ${config.maxDepth}`);
    }
    if (!Number.isFinite(config.epsilon) || config.epsilon <= 0) {
        throw new SceneValidationError('epsilon', `expected a positive finite number, got ${config.epsilon}`);
    }
    if (!Number.isInteger(config.workers) || config.workers < 1) {
        throw new SceneValidationError('workers', `expected a positive integer, got ${config.workers}`);
    }

    return config;
}
