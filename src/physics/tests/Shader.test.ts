import { describe, expect, test, vi } from "vitest";
import { Color, Vector3 } from "three";
import { Shader } from "../Shader";
import { Scene, createSceneObject } from "../Scene";
import { createPlane } from "../Shape";
import { createDirectionalLight } from "../lights";
import { createMaterial, Ray } from "../types";
import { render } from "../Renderer";
import { SceneValidationError } from "../errors";

const camera = { width: 4, height: 4, fov: 60 };

function mirrorCorridor(maxDepth?: number): Scene {
    const mirror = createMaterial(new Color(1, 1, 1), 1, maxDepth);
    return new Scene(camera, new Color(0.1, 0.1, 0.1), [
        createSceneObject(createPlane(new Vector3(-1, 0, 0), new Vector3(1, 0, 0)), mirror, "Left"),
        createSceneObject(createPlane(new Vector3(1, 0, 0), new Vector3(-1, 0, 0)), mirror, "Right"),
    ]);
}

// A wall at z = -5 facing the camera, lit head-on by a directional light
function litWall(reflectivity: number, background: Color): Scene {
    const wall = createSceneObject(
        createPlane(new Vector3(0, 0, -5), new Vector3(0, 0, 1)),
        createMaterial(new Color(0.4, 0.4, 0.4), reflectivity),
        "Wall"
    );
    return new Scene(camera, background, [wall], [createDirectionalLight(new Vector3(0, 0, -1))]);
}

const forward: Ray = { origin: new Vector3(0, 0, 0), direction: new Vector3(0, 0, -1) };
const sideways: Ray = { origin: new Vector3(0, 0, 0), direction: new Vector3(1, 0, 0) };

describe("Shader: terminal states", () => {
    test("a ray that hits nothing returns exactly the background color", () => {
        const background = new Color(0.1, 0.2, 0.3);
        const shader = new Shader(new Scene(camera, background, []));

        const c = shader.shade(forward, 0);
        expect(c.r).toBe(0.1);
        expect(c.g).toBe(0.2);
        expect(c.b).toBe(0.3);
        expect(c).not.toBe(background);
    });

    test("matte surface returns its diffuse color", () => {
        const shader = new Shader(litWall(0, new Color(0, 0, 0)));
        expect(shader.shade(forward, 0).toArray()).toEqual([0.4, 0.4, 0.4]);
    });
});

describe("Shader: reflection", () => {
    test("blends diffuse and reflected color by reflectivity", () => {
        const shader = new Shader(litWall(0.5, new Color(0.2, 0.6, 1)));

        // Reflected ray heads back toward +Z and sees the background
        const c = shader.shade(forward, 0);
        expect(c.r).toBeCloseTo(0.3, 12);
        expect(c.g).toBeCloseTo(0.5, 12);
        expect(c.b).toBeCloseTo(0.7, 12);
    });

    test("no bounce once depth reaches maxDepth", () => {
        const shader = new Shader(litWall(0.5, new Color(0.2, 0.6, 1)), { maxDepth: 0 });
        expect(shader.shade(forward, 0).toArray()).toEqual([0.4, 0.4, 0.4]);
    });

    test("facing perfect mirrors are queried exactly maxDepth + 1 times", () => {
        const scene = mirrorCorridor();
        const shader = new Shader(scene, { maxDepth: 5 });
        const spy = vi.spyOn(scene, "findNearest");

        const c = shader.shade(sideways, 0);

        expect(spy).toHaveBeenCalledTimes(6);
        expect(spy.mock.calls.map(call => Math.sign(call[0].direction.x))).toEqual([1, -1, 1, -1, 1, -1]);
        expect(Number.isFinite(c.r) && Number.isFinite(c.g) && Number.isFinite(c.b)).toBe(true);
    });

    test("a per-material cap overrides the render-wide one", () => {
        const scene = mirrorCorridor(2);
        const spy = vi.spyOn(scene, "findNearest");

        new Shader(scene, { maxDepth: 10 }).shade(sideways, 0);

        expect(spy).toHaveBeenCalledTimes(3);
    });

    test("a very deep cap between facing mirrors still terminates", () => {
        const c = new Shader(mirrorCorridor(), { maxDepth: 100000 }).shade(sideways, 0);
        expect(c.toArray()).toEqual([0, 0, 0]);
    });

    test("a deep per-material cap renders a whole image without exhausting the stack", () => {
        const scene = new Scene({ width: 2, height: 2, fov: 60 }, new Color(0.1, 0.1, 0.1), mirrorCorridor(100000).objects.slice());
        const image = render(scene);
        expect(Array.from(image.data)).toEqual(new Array(12).fill(0));
    });
});

describe("Shader: construction", () => {
    test("rejects a scene whose materials can't be traced", () => {
        const scene = new Scene(camera, new Color(0, 0, 0), [
            createSceneObject(createPlane(new Vector3(0, 0, -5), new Vector3(0, 0, 1)), createMaterial(new Color(1, 1, 1), 1, Infinity)),
        ]);
        expect(() => new Shader(scene)).toThrow(SceneValidationError);
    });
});

describe("Shader: numeric safety", () => {
    test("NaN material channels come out as black, not NaN", () => {
        const wall = createSceneObject(
            createPlane(new Vector3(0, 0, -5), new Vector3(0, 0, 1)),
            createMaterial(new Color(NaN, 0.5, 0.5)),
        );
        const scene = new Scene(camera, new Color(0, 0, 0), [wall], [createDirectionalLight(new Vector3(0, 0, -1))]);
        const c = new Shader(scene).shade(forward, 0);
        expect(c.r).toBe(0);
        expect(c.g).toBe(0.5);
    });
});
