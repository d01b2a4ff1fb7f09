import type { Vector3 } from 'three';
import { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import type { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { FlipNormals } from './flipNormals.js';
import { Group } from './group.js';
import { FIGURE_TYPE, type Hittable } from './primitive.js';
import { XYRect, XZRect, YZRect } from './rect.js';

// axis-aligned box spanning p0 (min corner) to p1 (max corner), made of six
// outward facing rects
export class Cuboid implements Hittable {
  readonly type = FIGURE_TYPE.CUBOID;

  public sides: Group;

  constructor(
    public p0: Vector3,
    public p1: Vector3
  ) {
    this.sides = new Group([
      new XYRect(p0.x, p1.x, p0.y, p1.y, p1.z),
      new FlipNormals(new XYRect(p0.x, p1.x, p0.y, p1.y, p0.z)),
      new XZRect(p0.x, p1.x, p0.z, p1.z, p1.y),
      new FlipNormals(new XZRect(p0.x, p1.x, p0.z, p1.z, p0.y)),
      new YZRect(p0.y, p1.y, p0.z, p1.z, p1.x),
      new FlipNormals(new YZRect(p0.y, p1.y, p0.z, p1.z, p0.x))
    ]);
  }

  hit(ray: Ray, tmin: number, tmax: number, rng: Rng): HitRecord | null {
    return this.sides.hit(ray, tmin, tmax, rng);
  }

  boundingBox(): AABB {
    return new AABB(this.p0.clone(), this.p1.clone());
  }

  pdfValue(origin: Vector3, direction: Vector3): number {
    return this.sides.pdfValue(origin, direction);
  }

  random(origin: Vector3, rng: Rng): Vector3 {
    return this.sides.random(origin, rng);
  }
}
