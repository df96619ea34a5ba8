import { Vector3 } from 'three';
import { Camera, Ray } from './types';
import { normalizeSafe } from './math_solvers';

const CAMERA_ORIGIN = new Vector3(0, 0, 0);

/**
 * Primary ray through the center of pixel (px, py).
 *
 * The camera is fixed: origin at (0, 0, 0), looking down -Z, +Y up. The image
 * plane sits at z = -1 and spans tan(fov/2) vertically; the horizontal extent
 * is scaled by the aspect ratio. Pixel (0, 0) is the top-left corner.
 */
export function primaryRay(camera: Camera, px: number, py: number): Ray {
    const scale = Math.tan((camera.fov * Math.PI / 180) / 2);
    const aspect = camera.width / camera.height;

    const x = (((px + 0.5) / camera.width) * 2 - 1) * aspect * scale;
    const y = (1 - ((py + 0.5) / camera.height) * 2) * scale;

    return {
        origin: CAMERA_ORIGIN.clone(),
        direction: normalizeSafe(new Vector3(x, y, -1)),
    };
}
