import { describe, expect, test } from "vitest";
import { Color, Vector3 } from "three";
import { Scene, createSceneObject, validateScene } from "../Scene";
import { createPlane, createSphere } from "../Shape";
import { createMaterial, Camera } from "../types";
import { SceneValidationError } from "../errors";

const camera: Camera = { width: 4, height: 3, fov: 60 };
const matte = createMaterial(new Color(1, 1, 1));
const forward = { origin: new Vector3(0, 0, 0), direction: new Vector3(0, 0, -1) };

describe("Scene.findNearest", () => {
    test("returns the closest of several objects", () => {
        const far = createSceneObject(createSphere(new Vector3(0, 0, -10), 1), matte, "Far");
        const near = createSceneObject(createSphere(new Vector3(0, 0, -4), 1), matte, "Near");
        const scene = new Scene(camera, new Color(0, 0, 0), [far, near]);

        const result = scene.findNearest(forward);
        expect(result?.object.name).toBe("Near");
        expect(result?.hit.t).toBe(3);
    });

    test("returns null when nothing is hit", () => {
        const behind = createSceneObject(createSphere(new Vector3(0, 0, 10), 1), matte);
        const scene = new Scene(camera, new Color(0, 0, 0), [behind]);
        expect(scene.findNearest(forward)).toBeNull();
    });

    test("equidistant objects resolve to the first in collection order", () => {
        const a = createSceneObject(createPlane(new Vector3(0, 0, -5), new Vector3(0, 0, 1)), matte, "A");
        const b = createSceneObject(createSphere(new Vector3(0, 0, -6), 1), matte, "B");

        // Both surfaces sit at t = 5 along the forward ray
        for (let i = 0; i < 3; i++) {
            expect(new Scene(camera, new Color(0, 0, 0), [a, b]).findNearest(forward)?.object.name).toBe("A");
            expect(new Scene(camera, new Color(0, 0, 0), [b, a]).findNearest(forward)?.object.name).toBe("B");
        }
    });

    test("maxDistance excludes hits at or beyond it", () => {
        const sphere = createSceneObject(createSphere(new Vector3(0, 0, -4), 1), matte);
        const scene = new Scene(camera, new Color(0, 0, 0), [sphere]);

        expect(scene.findNearest(forward, 1e-4, 3)).toBeNull();
        expect(scene.findNearest(forward, 1e-4, 3.5)?.hit.t).toBe(3);
        expect(scene.isOccluded(forward, 2)).toBe(false);
        expect(scene.isOccluded(forward, Infinity)).toBe(true);
    });

    test("objects get distinct ids", () => {
        const a = createSceneObject(createSphere(new Vector3(0, 0, -4), 1), matte);
        const b = createSceneObject(createSphere(new Vector3(0, 0, -4), 1), matte);
        expect(a.id).not.toBe(b.id);
        expect(a.name).toBe("Unnamed Object");
    });

    test("the scene keeps its own copy of the object list", () => {
        const objects = [createSceneObject(createSphere(new Vector3(0, 0, -4), 1), matte)];
        const scene = new Scene(camera, new Color(0, 0, 0), objects);
        objects.pop();
        expect(scene.objects.length).toBe(1);
    });
});

describe("validateScene", () => {
    test("accepts a well-formed scene", () => {
        expect(() => validateScene(new Scene(camera, new Color(0, 0, 0)))).not.toThrow();
    });

    test.each([
        [{ width: 0, height: 3, fov: 60 }, "camera.width"],
        [{ width: 4.5, height: 3, fov: 60 }, "camera.width"],
        [{ width: 4, height: -1, fov: 60 }, "camera.height"],
        [{ width: 4, height: 3, fov: 180 }, "camera.fov"],
        [{ width: 4, height: 3, fov: 0 }, "camera.fov"],
        [{ width: 4, height: 3, fov: NaN }, "camera.fov"],
    ])("rejects %o (%s)", (badCamera, field) => {
        try {
            validateScene(new Scene(badCamera, new Color(0, 0, 0)));
            expect.unreachable("validateScene should have thrown");
        } catch (e) {
            expect(e).toBeInstanceOf(SceneValidationError);
            expect(e instanceof SceneValidationError && e.field).toBe(field);
        }
    });

    test("rejects a non-finite background", () => {
        expect(() => validateScene(new Scene(camera, new Color(NaN, 0, 0)))).toThrow(SceneValidationError);
    });

    test.each([
        [createMaterial(new Color(1, 1, 1), 1, Infinity), "objects[1].material.maxDepth"],
        [createMaterial(new Color(1, 1, 1), 1, -1), "objects[1].material.maxDepth"],
        [createMaterial(new Color(1, 1, 1), 1, 2.5), "objects[1].material.maxDepth"],
        [createMaterial(new Color(1, 1, 1), 1.5), "objects[1].material.reflectivity"],
        [createMaterial(new Color(1, 1, 1), -0.1), "objects[1].material.reflectivity"],
        [createMaterial(new Color(1, 1, 1), NaN), "objects[1].material.reflectivity"],
    ])("rejects material %# (%s)", (material, field) => {
        const objects = [
            createSceneObject(createSphere(new Vector3(0, 0, -5), 1), matte),
            createSceneObject(createPlane(new Vector3(0, -1, 0), new Vector3(0, 1, 0)), material),
        ];
        try {
            validateScene(new Scene(camera, new Color(0, 0, 0), objects));
            expect.unreachable("validateScene should have thrown");
        } catch (e) {
            expect(e).toBeInstanceOf(SceneValidationError);
            expect(e instanceof SceneValidationError && e.field).toBe(field);
        }
    });

    test("accepts a mirror with a large but finite depth cap", () => {
        const mirror = createSceneObject(createPlane(new Vector3(0, -1, 0), new Vector3(0, 1, 0)), createMaterial(new Color(1, 1, 1), 1, 100000));
        expect(() => validateScene(new Scene(camera, new Color(0, 0, 0), [mirror]))).not.toThrow();
    });
});
