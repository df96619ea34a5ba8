import { Scene } from '../physics/Scene';
import { createThreeSpheresScene } from './threeSpheres';
import { createMirrorCorridorScene } from './mirrorCorridor';
import { createShadowBoxScene } from './shadowBox';

export { createThreeSpheresScene, createMirrorCorridorScene, createShadowBoxScene };

// Preset Management
export const PRESETS: ReadonlyMap<string, () => Scene> = new Map([
    ['three-spheres', () => createThreeSpheresScene()],
    ['mirror-corridor', () => createMirrorCorridorScene()],
    ['shadow-box', () => createShadowBoxScene()],
]);
