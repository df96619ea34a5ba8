import { Color, Vector3 } from 'three';
import { Scene, createSceneObject } from '../physics/Scene';
import { createPlane, createSphere } from '../physics/Shape';
import { createPointLight } from '../physics/lights';
import { createMaterial } from '../physics/types';

/**
 * Mirror Corridor — two perfect mirrors facing each other at x = ±3.
 *
 * A single sphere hangs between them; every ray that hits a wall bounces until
 * the reflection cap stops it, so this is the worst case for recursion depth.
 */
export function createMirrorCorridorScene(width: number = 320, height: number = 240): Scene {
    const mirror = createMaterial(new Color(1, 1, 1), 1);

    const objects = [
        createSceneObject(createPlane(new Vector3(-3, 0, 0), new Vector3(1, 0, 0)), mirror, "Left Mirror"),
        createSceneObject(createPlane(new Vector3(3, 0, 0), new Vector3(-1, 0, 0)), mirror, "Right Mirror"),
        createSceneObject(
            createSphere(new Vector3(0, 0, -6), 1),
            createMaterial(new Color(0.9, 0.6, 0.1)),
            "Gold Sphere"
        ),
    ];

    const lights = [createPointLight(new Vector3(0, 4, -3))];

    return new Scene({ width, height, fov: 70 }, new Color(0.05, 0.05, 0.1), objects, lights);
}
