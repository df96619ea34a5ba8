import { Color } from 'three';

/** Floats per pixel: r, g, b. */
export const CHANNELS = 3;

/**
 * Row-major RGB image, 3 float channels per pixel in [0, 1].
 * Pixel (x, y) lives at index (y * width + x) * 3.
 */
export class PixelBuffer {
    readonly width: number;
    readonly height: number;
    readonly data: Float32Array;

    constructor(width: number, height: number) {
        this.width = width;
        this.height = height;
        this.data = new Float32Array(width * height * CHANNELS);
    }

    private offset(x: number, y: number): number {
        if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
            throw new RangeError(`Pixel (${x}, ${y}) is outside ${this.width}x${this.height}`);
        }
        return (y * this.width + x) * CHANNELS;
    }

    setPixel(x: number, y: number, color: Color): void {
        const i = this.offset(x, y);
        this.data[i] = color.r;
        this.data[i + 1] = color.g;
        this.data[i + 2] = color.b;
    }

    getPixel(x: number, y: number): Color {
        const i = this.offset(x, y);
        return new Color(this.data[i], this.data[i + 1], this.data[i + 2]);
    }

    /** Copies a band of whole rows (as produced by renderRows) in at startRow. */
    writeRows(startRow: number, rows: Float32Array): void {
        const rowLength = this.width * CHANNELS;
        if (rows.length % rowLength !== 0) {
            throw new RangeError(`Band of ${rows.length} floats is not a whole number of ${this.width}px rows`);
        }
        const rowCount = rows.length / rowLength;
        if (startRow < 0 || startRow + rowCount > this.height) {
            throw new RangeError(`Rows ${startRow}..${startRow + rowCount} fall outside height ${this.height}`);
        }
        this.data.set(rows, startRow * rowLength);
    }
}
