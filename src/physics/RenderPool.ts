import * as fs from 'fs';
import * as path from 'path';
import { Worker } from 'worker_threads';
import { Scene, validateScene } from './Scene';
import { PixelBuffer } from './PixelBuffer';
import { partitionRows, render } from './Renderer';
import { RenderConfig, resolveRenderConfig } from '../state/config';
import { serializeScene } from '../state/sceneSerializer';

/** What a worker receives: the whole scene as text plus its band of rows. */
export interface RenderJob {
    sceneText: string;
    config: RenderConfig;
    start: number;
    end: number;
}

export interface RenderJobResult {
    start: number;
    rows: Float32Array;
}

export function isRenderJob(value: unknown): value is RenderJob {
    return typeof value === 'object' && value !== null
        && 'sceneText' in value && typeof value.sceneText === 'string'
        && 'start' in value && typeof value.start === 'number'
        && 'end' in value && typeof value.end === 'number'
        && 'config' in value && typeof value.config === 'object' && value.config !== null;
}

interface RunningJob {
    worker: Worker;
    result: Promise<RenderJobResult>;
}

function isRenderJobResult(value: unknown): value is RenderJobResult {
    return typeof value === 'object' && value !== null
        && 'start' in value && typeof value.start === 'number'
        && 'rows' in value && value.rows instanceof Float32Array;
}

/**
 * Renders row bands on worker threads. Every worker gets its own copy of the
 * scene and writes back a disjoint range of rows, so nothing is shared or locked.
 *
 * Worker threads load compiled JavaScript, so the pool needs the built
 * renderWorker.js next to it. Without it (e.g. running straight from the
 * TypeScript sources) the pool renders on the calling thread instead.
 */
export class RenderPool {
    readonly workerScript: string;

    constructor(workerScript: string = path.join(__dirname, 'renderWorker.js')) {
        this.workerScript = workerScript;
    }

    canSpawnWorkers(): boolean {
        return fs.existsSync(this.workerScript);
    }

    async render(scene: Scene, config: Partial<RenderConfig> = {}): Promise<PixelBuffer> {
        validateScene(scene);
        const resolved = resolveRenderConfig(config);

        if (resolved.workers <= 1) {
            return render(scene, resolved);
        }
        if (!this.canSpawnWorkers()) {
            console.warn(`RenderPool: worker script not found at ${this.workerScript}, rendering on the main thread`);
            return render(scene, resolved);
        }

        const { width, height } = scene.camera;
        const buffer = new PixelBuffer(width, height);
        const sceneText = serializeScene(scene);

        const jobs = partitionRows(height, resolved.workers).map(band => this.spawn({
            sceneText,
            config: resolved,
            start: band.start,
            end: band.end,
        }));

        let results: RenderJobResult[];
        try {
            results = await Promise.all(jobs.map(job => job.result));
        } catch (err) {
            // One band failed: stop the others
            await Promise.all(jobs.map(job => job.worker.terminate()));
            throw err;
        }

        for (const result of results) {
            buffer.writeRows(result.start, result.rows);
        }
        return buffer;
    }

    private spawn(job: RenderJob): RunningJob {
        const worker = new Worker(this.workerScript, { workerData: job });
        const result = new Promise<RenderJobResult>((resolve, reject) => {
            let settled = false;

            worker.once('message', (message: unknown) => {
                settled = true;
                if (isRenderJobResult(message)) {
                    resolve(message);
                } else {
                    reject(new Error(`RenderPool: malformed result for rows ${job.start}..${job.end}`));
                }
            });
            worker.once('error', (err) => {
                settled = true;
                reject(err);
            });
            worker.once('exit', (code) => {
                if (!settled) {
                    reject(new Error(`RenderPool: worker for rows ${job.start}..${job.end} exited with code ${code}`));
                }
            });
        });
        return { worker, result };
    }
}
