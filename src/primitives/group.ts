import type { Vector3 } from 'three';
import type { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import type { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { FIGURE_TYPE, NOT_A_LIGHT_DIRECTION, type Figure, type Hittable } from './primitive.js';

// unordered list of figures, intersected with a linear scan
export class Group implements Hittable {
  readonly type = FIGURE_TYPE.GROUP;

  constructor(public figures: Figure[]) {}

  hit(ray: Ray, tmin: number, tmax: number, rng: Rng): HitRecord | null {
    let closest = tmax;
    let record: HitRecord | null = null;

    for (let figure of this.figures) {
      let rec = figure.hit(ray, tmin, closest, rng);
      if (rec) {
        closest = rec.t;
        record = rec;
      }
    }

    return record;
  }

  boundingBox(): AABB | null {
    if (this.figures.length === 0) return null;

    let box: AABB | null = null;
    for (let figure of this.figures) {
      let figureBox = figure.boundingBox();
      if (!figureBox) return null;
      box = box ? box.surround(figureBox) : figureBox;
    }

    return box;
  }

  // every member is picked with the same probability
  pdfValue(origin: Vector3, direction: Vector3): number {
    let weight = 1 / this.figures.length;
    let sum = 0;
    for (let figure of this.figures) {
      sum += weight * figure.pdfValue(origin, direction);
    }
    return sum;
  }

  random(origin: Vector3, rng: Rng): Vector3 {
    if (this.figures.length === 0) return NOT_A_LIGHT_DIRECTION.clone();

    let index = Math.min(Math.floor(rng.float() * this.figures.length), this.figures.length - 1);
    return this.figures[index].random(origin, rng);
  }
}
