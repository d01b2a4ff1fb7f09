import { Vector3 } from 'three';
import type { Ray } from './ray.js';

const AXES = ['x', 'y', 'z'] as const;

export class AABB {
  constructor(
    public min: Vector3 = new Vector3(Infinity, Infinity, Infinity),
    public max: Vector3 = new Vector3(-Infinity, -Infinity, -Infinity)
  ) {}

  expand(param: Vector3): void;
  expand(param: AABB): void;
  expand(param: AABB | Vector3): void {
    if (param instanceof Vector3) {
      this.min.min(param);
      this.max.max(param);
    } else {
      this.min.min(param.min);
      this.max.max(param.max);
    }
  }

  // slab test. 1 / 0 gives +-Infinity, which the comparisons below handle
  // without special cases
  hit(ray: Ray, tmin: number, tmax: number): boolean {
    for (let axis of AXES) {
      let invD = 1 / ray.direction[axis];
      let t0 = (this.min[axis] - ray.origin[axis]) * invD;
      let t1 = (this.max[axis] - ray.origin[axis]) * invD;

      if (invD < 0) {
        let tmp = t0;
        t0 = t1;
        t1 = tmp;
      }

      tmin = t0 > tmin ? t0 : tmin;
      tmax = t1 < tmax ? t1 : tmax;

      if (tmax <= tmin) return false;
    }

    return true;
  }

  surround(other: AABB): AABB {
    return new AABB(
      this.min.clone().min(other.min),
      this.max.clone().max(other.max)
    );
  }

  translate(offset: Vector3): AABB {
    return new AABB(this.min.clone().add(offset), this.max.clone().add(offset));
  }

  contains(other: AABB): boolean {
    return (
      this.min.x <= other.min.x &&
      this.min.y <= other.min.y &&
      this.min.z <= other.min.z &&
      this.max.x >= other.max.x &&
      this.max.y >= other.max.y &&
      this.max.z >= other.max.z
    );
  }

  clone(): AABB {
    return new AABB(this.min.clone(), this.max.clone());
  }
}
