export { Ray } from './geometry/ray.js';
export { AABB } from './geometry/aabb.js';
export { ONB } from './geometry/onb.js';
export { BvhNode } from './geometry/bvh.js';
export type { HitRecord } from './geometry/intersection.js';

export {
  FIGURE_TYPE,
  NOT_A_LIGHT_DIRECTION,
  getFigureStats,
  type Figure,
  type FigureStats,
  type Hittable
} from './primitives/primitive.js';
export { Sphere } from './primitives/sphere.js';
export { XYRect, YZRect, XZRect } from './primitives/rect.js';
export { FlipNormals } from './primitives/flipNormals.js';
export { Translate } from './primitives/translate.js';
export { RotateY } from './primitives/rotateY.js';
export { ConstantMedium } from './primitives/constantMedium.js';
export { Group } from './primitives/group.js';
export { Cuboid } from './primitives/cuboid.js';
export { Entity } from './primitives/entity.js';

export { SolidTexture, CheckerTexture, NoiseTexture, type Texture } from './textures/texture.js';

export { MATERIAL_TYPE, type Material, type ScatterRecord } from './materials/material.js';
export { Lambertian } from './materials/lambertian.js';
export { Metal } from './materials/metal.js';
export { Dielectric } from './materials/dielectric.js';
export { DiffuseLight } from './materials/diffuseLight.js';
export { Isotropic } from './materials/isotropic.js';

export { PDF_TYPE, type Pdf } from './pdf/pdf.js';
export { CosinePdf } from './pdf/cosinePdf.js';
export { HitPdf } from './pdf/hitPdf.js';
export { MixPdf } from './pdf/mixPdf.js';

export { Camera, type CameraOptions } from './camera.js';
export { buildWorld, type Background, type SceneObject, type SceneOptions, type TracerScene } from './scene.js';
export { createScene, isSceneName, sceneNames, type SceneName } from './createScene.js';
export { color, renderTile, samplePixel, backgroundRadiance, T_MIN, DEFAULT_MAX_DEPTH, type CanvasSize } from './tracer.js';
export { TileSequence, TileManager, type Tile } from './tile.js';
export { toneMap, encodePPM } from './display.js';
export { createRng, type Rng } from './samplers/uniform.js';
export { ConfigManager, configManager, validateConfigOptions, type ConfigOptions } from './config.js';
export { Renderer, renderSync, createTasks, type RenderResult } from './renderer.js';
export { parseCliArgs } from './cli.js';
