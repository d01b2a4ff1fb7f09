import { Vector3 } from 'three';
import type { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import type { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { FIGURE_TYPE, NOT_A_LIGHT_DIRECTION, type Figure, type Hittable } from './primitive.js';

// offset used to look for the exit point once the entry point is known
const EXIT_EPSILON = 0.0001;

// isotropic fog of constant density filling `boundary`. The boundary must be
// convex: only the first entry/exit pair is considered
export class ConstantMedium implements Hittable {
  readonly type = FIGURE_TYPE.CONSTANT_MEDIUM;

  constructor(
    public density: number,
    public boundary: Figure
  ) {}

  hit(ray: Ray, tmin: number, tmax: number, rng: Rng): HitRecord | null {
    let entry = this.boundary.hit(ray, -Infinity, Infinity, rng);
    if (!entry) return null;

    let exit = this.boundary.hit(ray, entry.t + EXIT_EPSILON, Infinity, rng);
    if (!exit) return null;

    let t0 = Math.max(entry.t, tmin);
    let t1 = Math.min(exit.t, tmax);
    if (t0 >= t1) return null;
    if (t0 < 0) t0 = 0;

    // free-flight distances are sampled in world units, t is in units of |direction|
    let directionLength = ray.direction.length();
    let distanceInsideBoundary = (t1 - t0) * directionLength;
    let hitDistance = -(1 / this.density) * Math.log(rng.float());

    if (!(hitDistance < distanceInsideBoundary)) return null;

    let t = t0 + hitDistance / directionLength;

    return {
      t,
      point: ray.at(t),
      // media have no surface, any unit vector will do
      normal: new Vector3(1, 0, 0),
      u: 0,
      v: 0
    };
  }

  boundingBox(): AABB | null {
    return this.boundary.boundingBox();
  }

  pdfValue(): number {
    return 0;
  }

  random(): Vector3 {
    return NOT_A_LIGHT_DIRECTION.clone();
  }
}
