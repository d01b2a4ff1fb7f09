import type { Vector3 } from 'three';
import type { Camera } from './camera.js';
import { BvhNode } from './geometry/bvh.js';
import type { Material } from './materials/material.js';
import { Entity } from './primitives/entity.js';
import type { Figure } from './primitives/primitive.js';
import type { Rng } from './samplers/uniform.js';

export type Background = { type: 'sky' } | { type: 'solid'; color: Vector3 };

// built once before rendering, read-only afterwards
export type TracerScene = {
  world: Figure;
  materials: Material[];
  // what diffuse bounces aim at, null when the scene is lit by the background only
  lightShape: Figure | null;
  camera: Camera;
  background: Background;
};

export type SceneObject = {
  figure: Figure;
  material: Material;
};

export type SceneOptions = {
  aspect: number;
  // scenes are built from this generator only, so the same seed yields the same
  // scene (and the same BVH) in every worker
  rng: Rng;
};

// pairs every figure with its material and puts the lot in a BVH
export function buildWorld(
  objects: SceneObject[],
  rng: Rng
): { world: Figure; materials: Material[] } {
  let materials: Material[] = [];
  let entities = objects.map(({ figure, material }) => {
    let index = materials.indexOf(material);
    if (index === -1) {
      index = materials.length;
      materials.push(material);
    }
    return new Entity(figure, index);
  });

  return { world: new BvhNode(entities, rng), materials };
}
