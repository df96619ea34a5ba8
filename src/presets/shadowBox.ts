import { Color, Vector3 } from 'three';
import { Scene, createSceneObject } from '../physics/Scene';
import { createPlane, createSphere } from '../physics/Shape';
import { createPointLight } from '../physics/lights';
import { createMaterial } from '../physics/types';

/**
 * Shadow Box — a sphere directly between an overhead lamp and the floor,
 * casting a round shadow straight down. The lamp uses inverse-square falloff.
 */
export function createShadowBoxScene(width: number = 320, height: number = 240): Scene {
    const objects = [
        createSceneObject(
            createSphere(new Vector3(0, 0.5, -5), 0.75),
            createMaterial(new Color(0.8, 0.8, 0.8)),
            "Occluder"
        ),
        createSceneObject(
            createPlane(new Vector3(0, -1, 0), new Vector3(0, 1, 0)),
            createMaterial(new Color(1, 1, 1)),
            "Floor"
        ),
    ];

    const lights = [createPointLight(new Vector3(0, 5, -5), new Color(1, 1, 1), 300, 'inverseSquare')];

    return new Scene({ width, height, fov: 60 }, new Color(0, 0, 0), objects, lights);
}
