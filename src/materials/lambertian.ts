import type { HitRecord } from '../geometry/intersection.js';
import type { Ray } from '../geometry/ray.js';
import { CosinePdf } from '../pdf/cosinePdf.js';
import type { Texture } from '../textures/texture.js';
import { BaseMaterial, MATERIAL_TYPE, type ScatterRecord } from './material.js';

export class Lambertian extends BaseMaterial {
  readonly type = MATERIAL_TYPE.LAMBERTIAN;

  constructor(public albedo: Texture) {
    super();
  }

  scatter(rayIn: Ray, rec: HitRecord): ScatterRecord {
    return {
      attenuation: this.albedo.value(rec.u, rec.v, rec.point),
      specularRay: null,
      pdf: new CosinePdf(rec.normal),
      isScattered: true
    };
  }

  // has to agree with CosinePdf.value, the integrator divides one by the other
  scatteringPdf(rayIn: Ray, rec: HitRecord, scattered: Ray): number {
    let cosine = rec.normal.dot(scattered.direction.clone().normalize());
    return cosine < 0 ? 0 : cosine / Math.PI;
  }
}
