#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { Scene } from './physics/Scene';
import { RenderPool } from './physics/RenderPool';
import { DEFAULT_RENDER_CONFIG, RenderConfig } from './state/config';
import { loadSceneFile } from './state/sceneSerializer';
import { writePng } from './io/pngWriter';
import { PRESETS } from './presets';

export type CliOptions = {
    scene: string;
    output: string;
    pass: number;
    workers: number;
    epsilon: number;
    preset?: string;
    listPresets?: boolean;
};

function parseCount(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) {
        throw new InvalidArgumentError('expected a non-negative integer');
    }
    return n;
}

function parsePositiveNumber(value: string): number {
    const n = Number(value);
    if (!Number.isFinite(n) || n <= 0) {
        throw new InvalidArgumentError('expected a positive number');
    }
    return n;
}

export function buildProgram(): Command {
    return new Command()
        .name('lumen')
        .version('0.1.0')
        .description('A basic ray tracer: spheres, planes, shadows and mirror reflections')
        .option('-s, --scene <file>', 'scene file to render', 'scene.scn')
        .option('-o, --output <file>', 'PNG file to write', 'output.png')
        .option('-p, --pass <n>', 'reflection bounces per ray', parseCount, DEFAULT_RENDER_CONFIG.maxDepth)
        .option('-w, --workers <n>', 'worker threads', parseCount, DEFAULT_RENDER_CONFIG.workers)
        .option('-e, --epsilon <n>', 'self-intersection offset', parsePositiveNumber, DEFAULT_RENDER_CONFIG.epsilon)
        .option('--preset <name>', 'render a built-in scene instead of a file')
        .option('--list-presets', 'print the built-in scene names and exit');
}

function resolveScene(options: CliOptions): Scene {
    if (options.preset) {
        const factory = PRESETS.get(options.preset);
        if (!factory) {
            throw new Error(`Unknown preset "${options.preset}" (try: ${[...PRESETS.keys()].join(', ')})`);
        }
        console.log(`Using preset: ${options.preset}`);
        return factory();
    }
    console.log(`Using scene: ${options.scene}`);
    return loadSceneFile(options.scene);
}

export async function runCli(options: CliOptions): Promise<void> {
    if (options.listPresets) {
        for (const name of PRESETS.keys()) console.log(name);
        return;
    }

    const scene = resolveScene(options);
    const config: RenderConfig = {
        maxDepth: options.pass,
        epsilon: options.epsilon,
        workers: Math.max(1, options.workers),
    };

    console.log(`Writing to ${options.output}`);
    console.log(`Number of passes: ${config.maxDepth}`);

    const started = Date.now();
    const image = await new RenderPool().render(scene, config);
    console.log(`Rendered ${image.width}x${image.height} in ${Date.now() - started} ms`);

    writePng(image, options.output);
}

export async function main(argv: string[] = process.argv): Promise<void> {
    const program = buildProgram();
    program.parse(argv);

    try {
        await runCli(program.opts<CliOptions>());
    } catch (e) {
        console.error(`Application error: ${e instanceof Error ? e.message : String(e)}`);
        process.exitCode = 1;
    }
}

if (require.main === module) {
    void main();
}
