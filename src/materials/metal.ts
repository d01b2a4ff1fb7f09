import type { Vector3 } from 'three';
import type { HitRecord } from '../geometry/intersection.js';
import { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { clamp, randomInUnitSphere, reflect } from '../utils/math.js';
import { BaseMaterial, MATERIAL_TYPE, type ScatterRecord } from './material.js';

export class Metal extends BaseMaterial {
  readonly type = MATERIAL_TYPE.METAL;

  public fuzz: number;

  constructor(
    public albedo: Vector3,
    fuzz: number = 0
  ) {
    super();
    this.fuzz = clamp(fuzz, 0, 1);
  }

  scatter(rayIn: Ray, rec: HitRecord, rng: Rng): ScatterRecord {
    let reflected = reflect(rayIn.direction.clone().normalize(), rec.normal);
    let direction = reflected.addScaledVector(randomInUnitSphere(rng), this.fuzz);

    return {
      attenuation: this.albedo.clone(),
      specularRay: new Ray(rec.point.clone(), direction),
      pdf: null,
      // fuzz can push the reflection below the surface, in which case the ray is absorbed
      isScattered: direction.dot(rec.normal) > 0
    };
  }
}
