import type { SceneOptions, TracerScene } from './scene.js';
import { cornellBoxScene } from './scenes/cornellBox.js';
import { cornellSmokeScene } from './scenes/cornellSmoke.js';
import { singleSphereScene } from './scenes/singleSphere.js';
import { skySpheresScene } from './scenes/skySpheres.js';

export type SceneName = 'cornell-box' | 'cornell-smoke' | 'sky-spheres' | 'single-sphere';

const sceneConstructors: Record<SceneName, (options: SceneOptions) => TracerScene> = {
  'cornell-box': cornellBoxScene,
  'cornell-smoke': cornellSmokeScene,
  'sky-spheres': skySpheresScene,
  'single-sphere': singleSphereScene
};

export const sceneNames: SceneName[] = ['cornell-box', 'cornell-smoke', 'sky-spheres', 'single-sphere'];

export function isSceneName(name: string): name is SceneName {
  return sceneNames.some((sceneName) => sceneName === name);
}

export function createScene(name: string, options: SceneOptions): TracerScene {
  if (!isSceneName(name)) {
    throw new Error(`Unknown scene "${name}", available scenes: ${sceneNames.join(', ')}`);
  }
  return sceneConstructors[name](options);
}
