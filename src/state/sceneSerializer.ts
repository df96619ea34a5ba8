/**
 * Scene Serializer — Save/Load scenes as plain-text .scn files.
 *
 * Format: one block per entity, separated by blank lines.
 * Lines starting with # are comments.
 * Each block starts with [BlockType] and lists key = value pairs.
 * Vectors and colors are written as "x, y, z".
 *
 *   [Camera]            width, height, fov
 *   [Background]        color
 *   [Sphere]            id, name, center, radius, color, reflectivity, maxDepth
 *   [Plane]             id, name, point, normal, color, reflectivity, maxDepth
 *   [PointLight]        position, color, intensity, falloff
 *   [DirectionalLight]  direction, color, intensity
 */

import * as fs from 'fs';
import { Color, Vector3 } from 'three';
import { Camera, Material, createMaterial } from '../physics/types';
import { Scene, SceneObject, createSceneObject, validateScene } from '../physics/Scene';
import { Shape, createPlane, createSphere } from '../physics/Shape';
import { Light, createDirectionalLight, createPointLight, isFalloff } from '../physics/lights';

export const DEFAULT_CAMERA: Readonly<Camera> = Object.freeze({ width: 640, height: 480, fov: 60 });

// ════════════════════════════════════════════════════════════
//  SERIALIZE
// ════════════════════════════════════════════════════════════

export function serializeScene(scene: Scene): string {
    const lines: string[] = [];
    lines.push('# Ray Tracer Scene (.scn)');
    lines.push('');

    lines.push('[Camera]');
    lines.push(`width = ${fmt(scene.camera.width)}`);
    lines.push(`height = ${fmt(scene.camera.height)}`);
    lines.push(`fov = ${fmt(scene.camera.fov)}`);
    lines.push('');

    lines.push('[Background]');
    lines.push(`color = ${fmtColor(scene.background)}`);
    lines.push('');

    for (const object of scene.objects) {
        writeObject(object, lines);
        lines.push(''); // blank line separator
    }

    for (const light of scene.lights) {
        writeLight(light, lines);
        lines.push('');
    }

    return lines.join('\n');
}

// String(n) is the shortest text that parses back to the same double,
// apart from -0, which it prints as "0"
function fmt(n: number): string {
    return Object.is(n, -0) ? '-0' : String(n);
}

function fmtVec(v: Vector3): string {
    return `${fmt(v.x)}, ${fmt(v.y)}, ${fmt(v.z)}`;
}

function fmtColor(c: Color): string {
    return `${fmt(c.r)}, ${fmt(c.g)}, ${fmt(c.b)}`;
}

function writeObject(object: SceneObject, lines: string[]) {
    const { shape, material } = object;

    switch (shape.kind) {
        case 'sphere':
            lines.push('[Sphere]');
            lines.push(`id = ${object.id}`);
            lines.push(`name = ${object.name}`);
            lines.push(`center = ${fmtVec(shape.center)}`);
            lines.push(`radius = ${fmt(shape.radius)}`);
            break;
        case 'plane':
            lines.push('[Plane]');
            lines.push(`id = ${object.id}`);
            lines.push(`name = ${object.name}`);
            lines.push(`point = ${fmtVec(shape.point)}`);
            lines.push(`normal = ${fmtVec(shape.normal)}`);
            break;
    }

    lines.push(`color = ${fmtColor(material.color)}`);
    lines.push(`reflectivity = ${fmt(material.reflectivity)}`);
    if (material.maxDepth !== undefined) lines.push(`maxDepth = ${fmt(material.maxDepth)}`);
}

function writeLight(light: Light, lines: string[]) {
    switch (light.kind) {
        case 'point':
            lines.push('[PointLight]');
            lines.push(`position = ${fmtVec(light.position)}`);
            lines.push(`color = ${fmtColor(light.color)}`);
            lines.push(`intensity = ${fmt(light.intensity)}`);
            lines.push(`falloff = ${light.falloff}`);
            break;
        case 'directional':
            lines.push('[DirectionalLight]');
            lines.push(`direction = ${fmtVec(light.direction)}`);
            lines.push(`color = ${fmtColor(light.color)}`);
            lines.push(`intensity = ${fmt(light.intensity)}`);
            break;
    }
}

// ════════════════════════════════════════════════════════════
//  DESERIALIZE
// ════════════════════════════════════════════════════════════

export function deserializeScene(text: string): Scene {
    let camera: Camera = { ...DEFAULT_CAMERA };
    let background = new Color(0, 0, 0);
    const objects: SceneObject[] = [];
    const lights: Light[] = [];

    for (const block of readBlocks(text)) {
        const { type } = block;
        switch (type) {
            case 'Camera':
                camera = {
                    width: block.number('width', DEFAULT_CAMERA.width),
                    height: block.number('height', DEFAULT_CAMERA.height),
                    fov: block.number('fov', DEFAULT_CAMERA.fov),
                };
                break;
            case 'Background':
                background = block.color('color', new Color(0, 0, 0));
                break;
            case 'Sphere':
            case 'Plane': {
                const object = createSceneObject(createShape(type, block), parseMaterial(block), block.text('name', type));
                const id = block.text('id', '');
                if (id) object.id = id;
                objects.push(object);
                break;
            }
            case 'PointLight':
            case 'DirectionalLight':
                lights.push(createLight(type, block));
                break;
            default:
                console.warn(`SceneSerializer: Unknown block type "${type}", skipping`);
        }
    }

    return new Scene(camera, background, objects, lights);
}

function createShape(type: 'Sphere' | 'Plane', block: SceneBlock): Shape {
    if (type === 'Sphere') {
        return createSphere(block.vector('center', new Vector3(0, 0, -5)), block.number('radius', 1));
    }
    return createPlane(block.vector('point', new Vector3(0, -1, 0)), block.vector('normal', new Vector3(0, 1, 0)));
}

function parseMaterial(block: SceneBlock): Material {
    return createMaterial(
        block.color('color', new Color(1, 1, 1)),
        block.number('reflectivity', 0),
        block.has('maxDepth') ? block.number('maxDepth', 0) : undefined
    );
}

function createLight(type: 'PointLight' | 'DirectionalLight', block: SceneBlock): Light {
    if (type === 'PointLight') {
        const falloff = block.text('falloff', 'none');
        if (!isFalloff(falloff)) {
            console.warn(`SceneSerializer: Unknown falloff "${falloff}", using "none"`);
        }
        return createPointLight(
            block.vector('position', new Vector3(0, 5, 0)),
            block.color('color', new Color(1, 1, 1)),
            block.number('intensity', 1),
            isFalloff(falloff) ? falloff : 'none'
        );
    }
    return createDirectionalLight(
        block.vector('direction', new Vector3(0, -1, 0)),
        block.color('color', new Color(1, 1, 1)),
        block.number('intensity', 1)
    );
}

/**
 * Reads a number back from the text fmt() writes. "NaN" and "Infinity" are
 * values like any other, so a saved scene reloads with the same doubles.
 * Returns null for text that isn't a number at all.
 */
export function parseNumber(text: string): number | null {
    const token = text.trim();
    if (token === 'NaN') return NaN;
    if (token === '') return null;
    const n = Number(token);
    return Number.isNaN(n) ? null : n;
}

/** One `[Type]` header and the `key = value` entries under it. */
class SceneBlock {
    readonly type: string;
    private readonly entries = new Map<string, string>();

    constructor(type: string) {
        this.type = type;
    }

    set(key: string, value: string): void {
        this.entries.set(key, value);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    text(key: string, fallback: string): string {
        return this.entries.get(key) ?? fallback;
    }

    number(key: string, fallback: number): number {
        const raw = this.entries.get(key);
        if (raw === undefined) return fallback;

        const n = parseNumber(raw);
        if (n === null) {
            console.warn(`SceneSerializer: "${key} = ${raw}" is not a number, using ${fallback}`);
            return fallback;
        }
        return n;
    }

    vector(key: string, fallback: Vector3): Vector3 {
        const t = this.triple(key);
        return t ? new Vector3(t[0], t[1], t[2]) : fallback;
    }

    color(key: string, fallback: Color): Color {
        const t = this.triple(key);
        return t ? new Color(t[0], t[1], t[2]) : fallback;
    }

    private triple(key: string): [number, number, number] | null {
        const raw = this.entries.get(key);
        if (raw === undefined) return null;

        const parts = raw.split(',').map(parseNumber);
        const [x, y, z] = parts;
        if (parts.length !== 3 || x === null || y === null || z === null) {
            console.warn(`SceneSerializer: "${key} = ${raw}" is not an "x, y, z" triple, using the default`);
            return null;
        }
        return [x, y, z];
    }
}

const HEADER = /^\[(\w+)\]$/;
const ENTRY = /^([^=]+?)\s*=\s*(.*)$/;

// A header opens a block and a blank line closes it; '#' lines are ignored
function readBlocks(text: string): SceneBlock[] {
    const blocks: SceneBlock[] = [];
    let open: SceneBlock | null = null;

    for (const line of text.split(/\r?\n/).map(l => l.trim())) {
        if (line === '') {
            open = null;
            continue;
        }
        if (line.startsWith('#')) continue;

        const header = HEADER.exec(line);
        if (header) {
            open = new SceneBlock(header[1]);
            blocks.push(open);
            continue;
        }

        const entry = ENTRY.exec(line);
        if (entry && open) open.set(entry[1], entry[2]);
    }

    return blocks;
}

// ════════════════════════════════════════════════════════════
//  FILE I/O HELPERS
// ════════════════════════════════════════════════════════════

/** Read and validate a .scn file. */
export function loadSceneFile(path: string): Scene {
    const scene = deserializeScene(fs.readFileSync(path, 'utf8'));
    validateScene(scene);
    return scene;
}

export function saveSceneFile(scene: Scene, path: string): void {
    fs.writeFileSync(path, serializeScene(scene), 'utf8');
}
