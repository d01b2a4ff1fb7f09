import type { Vector3 } from 'three';
import type { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { FIGURE_TYPE, type Figure, type Hittable } from './primitive.js';

export class Translate implements Hittable {
  readonly type = FIGURE_TYPE.TRANSLATE;

  constructor(
    public offset: Vector3,
    public figure: Figure
  ) {}

  hit(ray: Ray, tmin: number, tmax: number, rng: Rng): HitRecord | null {
    let movedRay = new Ray(ray.origin.clone().sub(this.offset), ray.direction);
    let rec = this.figure.hit(movedRay, tmin, tmax, rng);
    if (rec) rec.point.add(this.offset);
    return rec;
  }

  // the child's box lives in local space
  boundingBox(): AABB | null {
    let box = this.figure.boundingBox();
    return box ? box.translate(this.offset) : null;
  }

  pdfValue(origin: Vector3, direction: Vector3): number {
    return this.figure.pdfValue(origin.clone().sub(this.offset), direction);
  }

  random(origin: Vector3, rng: Rng): Vector3 {
    return this.figure.random(origin.clone().sub(this.offset), rng);
  }
}
