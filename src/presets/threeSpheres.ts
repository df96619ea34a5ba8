import { Color, Vector3 } from 'three';
import { Scene, SceneObject, createSceneObject } from '../physics/Scene';
import { createPlane, createSphere } from '../physics/Shape';
import { Light, createDirectionalLight, createPointLight } from '../physics/lights';
import { createMaterial } from '../physics/types';

/**
 * Three Spheres — the classic test scene.
 *
 * Layout (camera at origin, looking down -Z):
 *   red matte sphere on the left, half-mirror in the middle, blue sphere on the right,
 *   all resting on a grey floor at y = -1, lit by a warm lamp and a cool sun.
 */
export function createThreeSpheresScene(width: number = 640, height: number = 480): Scene {
    const objects: SceneObject[] = [];

    objects.push(createSceneObject(
        createSphere(new Vector3(-2.2, 0, -6), 1),
        createMaterial(new Color(0.9, 0.2, 0.2)),
        "Red Sphere"
    ));

    objects.push(createSceneObject(
        createSphere(new Vector3(0, 0, -7), 1),
        createMaterial(new Color(0.9, 0.9, 0.9), 0.5),
        "Mirror Sphere"
    ));

    objects.push(createSceneObject(
        createSphere(new Vector3(2.2, 0, -6), 1),
        createMaterial(new Color(0.2, 0.3, 0.9), 0.1),
        "Blue Sphere"
    ));

    objects.push(createSceneObject(
        createPlane(new Vector3(0, -1, 0), new Vector3(0, 1, 0)),
        createMaterial(new Color(0.6, 0.6, 0.6), 0.2),
        "Floor"
    ));

    const lights: Light[] = [
        createPointLight(new Vector3(-4, 6, -2), new Color(1, 0.9, 0.8), 0.8),
        createDirectionalLight(new Vector3(1, -1, -1), new Color(0.6, 0.7, 1), 0.5),
    ];

    return new Scene({ width, height, fov: 60 }, new Color(0.2, 0.3, 0.5), objects, lights);
}
