import * as fs from 'fs';
import { PNG } from 'pngjs';
import { PixelBuffer, CHANNELS } from '../physics/PixelBuffer';
import { clamp } from '../physics/math_solvers';

/** 8-bit RGBA bytes (alpha always 255), each channel rounded from [0, 1]. */
export function toRGBA8(buffer: PixelBuffer): Uint8Array {
    const pixelCount = buffer.width * buffer.height;
    const out = new Uint8Array(pixelCount * 4);

    for (let p = 0; p < pixelCount; p++) {
        const src = p * CHANNELS;
        const dst = p * 4;
        out[dst] = toByte(buffer.data[src]);
        out[dst + 1] = toByte(buffer.data[src + 1]);
        out[dst + 2] = toByte(buffer.data[src + 2]);
        out[dst + 3] = 255;
    }
    return out;
}

function toByte(channel: number): number {
    return Number.isFinite(channel) ? Math.round(clamp(channel, 0, 1) * 255) : 0;
}

export function encodePng(buffer: PixelBuffer): Buffer {
    const png = new PNG({ width: buffer.width, height: buffer.height });
    png.data = Buffer.from(toRGBA8(buffer));
    return PNG.sync.write(png);
}

export function writePng(buffer: PixelBuffer, path: string): void {
    fs.writeFileSync(path, encodePng(buffer));
}
