import { Scene, validateScene } from './Scene';
import { Shader } from './Shader';
import { primaryRay } from './Camera';
import { PixelBuffer, CHANNELS } from './PixelBuffer';
import { sanitizeColor } from './math_solvers';
import { RenderConfig, resolveRenderConfig } from '../state/config';

/** Half-open range of image rows [start, end). */
export interface RowBand {
    start: number;
    end: number;
}

/**
 * Splits `height` rows into at most `bands` contiguous, non-overlapping ranges
 * covering every row. Earlier bands take the extra row when it doesn't divide.
 */
export function partitionRows(height: number, bands: number): RowBand[] {
    const count = Math.max(1, Math.min(height, Math.floor(bands)));
    const base = Math.floor(height / count);
    const extra = height % count;

    const result: RowBand[] = [];
    let start = 0;
    for (let i = 0; i < count; i++) {
        const size = base + (i < extra ? 1 : 0);
        result.push({ start, end: start + size });
        start += size;
    }
    return result;
}

/**
 * Traces rows [startRow, endRow) and returns them as a packed RGB band.
 * Only reads the scene, so bands can be rendered in any order or in parallel.
 */
export function renderRows(scene: Scene, config: Partial<RenderConfig>, startRow: number, endRow: number): Float32Array {
    const { width } = scene.camera;
    const shader = new Shader(scene, config);
    const band = new Float32Array((endRow - startRow) * width * CHANNELS);

    let i = 0;
    for (let y = startRow; y < endRow; y++) {
        for (let x = 0; x < width; x++) {
            const color = sanitizeColor(shader.shade(primaryRay(scene.camera, x, y), 0));
            band[i++] = color.r;
            band[i++] = color.g;
            band[i++] = color.b;
        }
    }
    return band;
}

/** Renders the whole image on the calling thread. Same scene in, same bits out. */
export function render(scene: Scene, config: Partial<RenderConfig> = {}): PixelBuffer {
    validateScene(scene);
    const resolved = resolveRenderConfig(config);

    const { width, height } = scene.camera;
    const buffer = new PixelBuffer(width, height);

    for (const band of partitionRows(height, resolved.workers)) {
        buffer.writeRows(band.start, renderRows(scene, resolved, band.start, band.end));
    }
    return buffer;
}
