import { Vector3 } from 'three';
import { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { FIGURE_TYPE, type Hittable } from './primitive.js';

type Axis = 'x' | 'y' | 'z';

// thickness given to the flat box of a rect, degenerate boxes break the slab test
const RECT_BOX_PADDING = 0.0001;

// a rectangle lying on the plane `kAxis = k`, spanning [a0, a1] x [b0, b1]
// on the two remaining axes
abstract class AxisAlignedRect implements Hittable {
  abstract readonly type: FIGURE_TYPE.XY_RECT | FIGURE_TYPE.YZ_RECT | FIGURE_TYPE.XZ_RECT;

  protected abstract readonly aAxis: Axis;
  protected abstract readonly bAxis: Axis;
  protected abstract readonly kAxis: Axis;

  constructor(
    public a0: number,
    public a1: number,
    public b0: number,
    public b1: number,
    public k: number
  ) {}

  get normal(): Vector3 {
    return new Vector3().setComponent(axisIndex(this.kAxis), 1);
  }

  get area(): number {
    return (this.a1 - this.a0) * (this.b1 - this.b0);
  }

  hit(ray: Ray, tmin: number, tmax: number): HitRecord | null {
    let t = (this.k - ray.origin[this.kAxis]) / ray.direction[this.kAxis];
    // written negated so that a NaN t (ray lying on the plane) is rejected
    if (!(t > tmin && t < tmax)) return null;

    let a = ray.origin[this.aAxis] + t * ray.direction[this.aAxis];
    let b = ray.origin[this.bAxis] + t * ray.direction[this.bAxis];
    if (!(a >= this.a0 && a <= this.a1 && b >= this.b0 && b <= this.b1)) return null;

    return {
      t,
      point: ray.at(t),
      normal: this.normal,
      u: (a - this.a0) / (this.a1 - this.a0),
      v: (b - this.b0) / (this.b1 - this.b0)
    };
  }

  boundingBox(): AABB {
    let min = new Vector3();
    let max = new Vector3();
    min[this.aAxis] = this.a0;
    max[this.aAxis] = this.a1;
    min[this.bAxis] = this.b0;
    max[this.bAxis] = this.b1;
    min[this.kAxis] = this.k - RECT_BOX_PADDING;
    max[this.kAxis] = this.k + RECT_BOX_PADDING;
    return new AABB(min, max);
  }

  pdfValue(origin: Vector3, direction: Vector3): number {
    let rec = this.hit(new Ray(origin, direction), 0.001, Infinity);
    if (!rec) return 0;

    let distanceSquared = rec.t * rec.t * direction.lengthSq();
    let cosine = Math.abs(direction.dot(rec.normal)) / direction.length();

    return distanceSquared / (cosine * this.area);
  }

  random(origin: Vector3, rng: Rng): Vector3 {
    let point = new Vector3();
    point[this.aAxis] = this.a0 + rng.float() * (this.a1 - this.a0);
    point[this.bAxis] = this.b0 + rng.float() * (this.b1 - this.b0);
    point[this.kAxis] = this.k;
    return point.sub(origin);
  }
}

function axisIndex(axis: Axis): number {
  return axis === 'x' ? 0 : axis === 'y' ? 1 : 2;
}

export class XYRect extends AxisAlignedRect {
  readonly type = FIGURE_TYPE.XY_RECT;
  protected readonly aAxis = 'x';
  protected readonly bAxis = 'y';
  protected readonly kAxis = 'z';
}

export class YZRect extends AxisAlignedRect {
  readonly type = FIGURE_TYPE.YZ_RECT;
  protected readonly aAxis = 'y';
  protected readonly bAxis = 'z';
  protected readonly kAxis = 'x';
}

export class XZRect extends AxisAlignedRect {
  readonly type = FIGURE_TYPE.XZ_RECT;
  protected readonly aAxis = 'x';
  protected readonly bAxis = 'z';
  protected readonly kAxis = 'y';
}
