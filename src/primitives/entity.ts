import type { Vector3 } from 'three';
import type { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import type { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { FIGURE_TYPE, type Figure, type Hittable } from './primitive.js';

// a scene object: a figure paired with the index of its material
export class Entity implements Hittable {
  readonly type = FIGURE_TYPE.ENTITY;

  constructor(
    public figure: Figure,
    public materialIndex: number
  ) {}

  hit(ray: Ray, tmin: number, tmax: number, rng: Rng): HitRecord | null {
    let rec = this.figure.hit(ray, tmin, tmax, rng);
    if (rec) rec.materialIndex = this.materialIndex;
    return rec;
  }

  boundingBox(): AABB | null {
    return this.figure.boundingBox();
  }

  pdfValue(origin: Vector3, direction: Vector3): number {
    return this.figure.pdfValue(origin, direction);
  }

  random(origin: Vector3, rng: Rng): Vector3 {
    return this.figure.random(origin, rng);
  }
}
