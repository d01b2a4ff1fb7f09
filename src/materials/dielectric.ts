import { Vector3 } from 'three';
import type { HitRecord } from '../geometry/intersection.js';
import { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { reflect } from '../utils/math.js';
import { BaseMaterial, MATERIAL_TYPE, type ScatterRecord } from './material.js';

export class Dielectric extends BaseMaterial {
  readonly type = MATERIAL_TYPE.DIELECTRIC;

  constructor(public refractionIndex: number) {
    super();
  }

  // Snell's law, null on total internal reflection
  static refract(v: Vector3, n: Vector3, niOverNt: number): Vector3 | null {
    let uv = v.clone().normalize();
    let dt = uv.dot(n);
    let discriminant = 1.0 - niOverNt * niOverNt * (1.0 - dt * dt);

    if (discriminant > 0.0) {
      // ni_over_nt * (uv - n * dt) - n * sqrt(discriminant)
      return uv
        .addScaledVector(n, -dt)
        .multiplyScalar(niOverNt)
        .addScaledVector(n, -Math.sqrt(discriminant));
    }

    return null;
  }

  static schlick(cosine: number, refractionIndex: number): number {
    let r0 = (1.0 - refractionIndex) / (1.0 + refractionIndex);
    r0 *= r0;
    return r0 + (1.0 - r0) * Math.pow(1.0 - cosine, 5.0);
  }

  scatter(rayIn: Ray, rec: HitRecord, rng: Rng): ScatterRecord {
    let normal = rec.normal;
    let refractionIndex = this.refractionIndex;

    let outwardNormal: Vector3;
    let niOverNt: number;
    let cosine: number;

    let dirDotNormal = rayIn.direction.dot(normal);
    let dirLength = rayIn.direction.length();

    if (dirDotNormal > 0.0) {
      // leaving the object
      outwardNormal = normal.clone().negate();
      niOverNt = refractionIndex;
      cosine = (refractionIndex * dirDotNormal) / dirLength;
    } else {
      outwardNormal = normal;
      niOverNt = 1.0 / refractionIndex;
      cosine = -dirDotNormal / dirLength;
    }

    let refracted = Dielectric.refract(rayIn.direction, outwardNormal, niOverNt);
    let reflectProb = refracted ? Dielectric.schlick(cosine, refractionIndex) : 1.0;

    let direction: Vector3;
    if (!refracted || rng.float() < reflectProb) {
      direction = reflect(rayIn.direction, normal);
    } else {
      direction = refracted;
    }

    return {
      attenuation: new Vector3(1, 1, 1),
      specularRay: new Ray(rec.point.clone(), direction),
      pdf: null,
      isScattered: true
    };
  }
}
