import { Vector3 } from 'three';
import type { HitRecord } from './geometry/intersection.js';
import { Ray } from './geometry/ray.js';
import type { Material } from './materials/material.js';
import { HitPdf } from './pdf/hitPdf.js';
import { MixPdf } from './pdf/mixPdf.js';
import type { Pdf } from './pdf/pdf.js';
import type { Background, TracerScene } from './scene.js';
import type { Rng } from './samplers/uniform.js';
import type { Tile } from './tile.js';
import { deNaN } from './utils/math.js';

// lower bound of the hit interval, keeps bounced rays from hitting the surface
// they start on
export const T_MIN = 0.001;
export const DEFAULT_MAX_DEPTH = 50;

export type CanvasSize = {
  width: number;
  height: number;
};

export function backgroundRadiance(background: Background, ray: Ray): Vector3 {
  switch (background.type) {
    case 'sky': {
      let t = 0.5 * (ray.direction.clone().normalize().y + 1.0);
      return new Vector3(1, 1, 1).multiplyScalar(1.0 - t).addScaledVector(new Vector3(0.5, 0.7, 1.0), t);
    }
    case 'solid':
      return background.color.clone();
  }
}

function getMaterial(scene: TracerScene, rec: HitRecord): Material {
  let material = rec.materialIndex === undefined ? undefined : scene.materials[rec.materialIndex];
  if (!material) {
    throw new Error(
      `Hit at t=${rec.t} resolved to material index ${rec.materialIndex}, which the scene doesn't define`
    );
  }
  return material;
}

export function color(
  ray: Ray,
  scene: TracerScene,
  depth: number,
  rng: Rng,
  maxDepth: number = DEFAULT_MAX_DEPTH
): Vector3 {
  let rec = scene.world.hit(ray, T_MIN, Infinity, rng);
  if (!rec) return backgroundRadiance(scene.background, ray);

  let material = getMaterial(scene, rec);
  let emitted = material.emitted(rec.u, rec.v, rec.point);
  let srec = material.scatter(ray, rec, rng);

  if (depth >= maxDepth || !srec.isScattered) return emitted;

  if (srec.specularRay) {
    return srec.attenuation.multiply(color(srec.specularRay, scene, depth + 1, rng, maxDepth));
  }

  if (!srec.pdf) return emitted;

  // half of the bounces aim at the lights, half follow the material
  let pdf: Pdf = scene.lightShape
    ? new MixPdf(new HitPdf(scene.lightShape, rec.point), srec.pdf)
    : srec.pdf;

  let scattered = new Ray(rec.point.clone(), pdf.generate(rng));
  let pdfValue = pdf.value(scattered.direction);
  let scatteringPdf = material.scatteringPdf(ray, rec, scattered);

  let incoming = color(scattered, scene, depth + 1, rng, maxDepth);

  return emitted.add(srec.attenuation.multiplyScalar(scatteringPdf).multiply(incoming).divideScalar(pdfValue));
}

// one sample of pixel (x, y), y = 0 being the top row
export function samplePixel(
  scene: TracerScene,
  x: number,
  y: number,
  canvasSize: CanvasSize,
  rng: Rng,
  maxDepth: number = DEFAULT_MAX_DEPTH
): Vector3 {
  let s = (x + rng.float()) / canvasSize.width;
  let t = (canvasSize.height - 1 - y + rng.float()) / canvasSize.height;
  let ray = scene.camera.getRay(s, t, rng);
  return deNaN(color(ray, scene, 0, rng, maxDepth));
}

// returns the sum of `samples` radiance samples for every pixel of the tile,
// laid out row by row, 3 floats per pixel
export function renderTile(
  scene: TracerScene,
  tile: Tile,
  canvasSize: CanvasSize,
  samples: number,
  rng: Rng,
  maxDepth: number = DEFAULT_MAX_DEPTH
): Float32Array<ArrayBuffer> {
  let data = new Float32Array(tile.w * tile.h * 3);

  for (let s = 0; s < samples; s++) {
    for (let j = 0; j < tile.h; j++) {
      for (let i = 0; i < tile.w; i++) {
        let radiance = samplePixel(scene, tile.x + i, tile.y + j, canvasSize, rng, maxDepth);

        let index = (j * tile.w + i) * 3;
        data[index + 0] += radiance.x;
        data[index + 1] += radiance.y;
        data[index + 2] += radiance.z;
      }
    }
  }

  return data;
}
