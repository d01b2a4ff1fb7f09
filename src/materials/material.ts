import { Vector3 } from 'three';
import type { HitRecord } from '../geometry/intersection.js';
import type { Ray } from '../geometry/ray.js';
import type { Pdf } from '../pdf/pdf.js';
import type { Rng } from '../samplers/uniform.js';
import type { Dielectric } from './dielectric.js';
import type { DiffuseLight } from './diffuseLight.js';
import type { Isotropic } from './isotropic.js';
import type { Lambertian } from './lambertian.js';
import type { Metal } from './metal.js';

export enum MATERIAL_TYPE {
  LAMBERTIAN = 0,
  METAL = 1,
  DIELECTRIC = 2,
  DIFFUSE_LIGHT = 3,
  ISOTROPIC = 4
}

// at most one of specularRay / pdf is set: specular materials hand back the
// next ray directly, diffuse ones a strategy to sample it
export type ScatterRecord = {
  attenuation: Vector3;
  specularRay: Ray | null;
  pdf: Pdf | null;
  isScattered: boolean;
};

export abstract class BaseMaterial {
  abstract readonly type: MATERIAL_TYPE;

  abstract scatter(rayIn: Ray, rec: HitRecord, rng: Rng): ScatterRecord;

  // BRDF times cosine, for materials that scatter through a pdf
  scatteringPdf(rayIn: Ray, rec: HitRecord, scattered: Ray): number {
    return 0;
  }

  emitted(u: number, v: number, point: Vector3): Vector3 {
    return new Vector3(0, 0, 0);
  }
}

export type Material = Lambertian | Metal | Dielectric | DiffuseLight | Isotropic;

export function absorbed(): ScatterRecord {
  return {
    attenuation: new Vector3(0, 0, 0),
    specularRay: null,
    pdf: null,
    isScattered: false
  };
}
