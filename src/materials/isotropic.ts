import type { HitRecord } from '../geometry/intersection.js';
import { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import type { Texture } from '../textures/texture.js';
import { randomInUnitSphere } from '../utils/math.js';
import { BaseMaterial, MATERIAL_TYPE, type ScatterRecord } from './material.js';

// phase function of a ConstantMedium: scatters uniformly in every direction
export class Isotropic extends BaseMaterial {
  readonly type = MATERIAL_TYPE.ISOTROPIC;

  constructor(public albedo: Texture) {
    super();
  }

  scatter(rayIn: Ray, rec: HitRecord, rng: Rng): ScatterRecord {
    return {
      attenuation: this.albedo.value(rec.u, rec.v, rec.point),
      specularRay: new Ray(rec.point.clone(), randomInUnitSphere(rng)),
      pdf: null,
      isScattered: true
    };
  }
}
