import type { Vector3 } from 'three';
import { FIGURE_TYPE, NOT_A_LIGHT_DIRECTION, type Figure, type Hittable } from '../primitives/primitive.js';
import type { Rng } from '../samplers/uniform.js';
import type { AABB } from './aabb.js';
import type { HitRecord } from './intersection.js';
import type { Ray } from './ray.js';

const AXES = ['x', 'y', 'z'] as const;

type BoxedFigure = {
  figure: Figure;
  box: AABB;
};

export class BvhNode implements Hittable {
  readonly type = FIGURE_TYPE.BVH_NODE;

  public left: Figure;
  public right: Figure;
  public bbox: AABB;

  constructor(figures: Figure[], rng: Rng) {
    if (figures.length === 0) {
      throw new Error('Cannot build a BVH out of an empty list of figures');
    }

    let boxed = figures.map((figure, i): BoxedFigure => {
      let box = figure.boundingBox();
      if (!box) {
        throw new Error(
          `Figure at index ${i} (type ${FIGURE_TYPE[figure.type]}) has no bounding box and can't be placed in a BVH`
        );
      }
      return { figure, box };
    });

    let axis = AXES[Math.min(Math.floor(3 * rng.float()), 2)];
    boxed.sort((a, b) => a.box.min[axis] - b.box.min[axis]);

    let n = boxed.length;
    if (n === 1) {
      // both children point to the same figure, `hit` only tests it once
      this.left = boxed[0].figure;
      this.right = boxed[0].figure;
      this.bbox = boxed[0].box.clone();
    } else if (n === 2) {
      this.left = boxed[0].figure;
      this.right = boxed[1].figure;
      this.bbox = boxed[0].box.surround(boxed[1].box);
    } else {
      let half = Math.floor(n / 2);
      let left = new BvhNode(
        boxed.slice(0, half).map((b) => b.figure),
        rng
      );
      let right = new BvhNode(
        boxed.slice(half).map((b) => b.figure),
        rng
      );
      this.left = left;
      this.right = right;
      this.bbox = left.bbox.surround(right.bbox);
    }
  }

  hit(ray: Ray, tmin: number, tmax: number, rng: Rng): HitRecord | null {
    if (!this.bbox.hit(ray, tmin, tmax)) return null;

    let hitLeft = this.left.hit(ray, tmin, tmax, rng);
    // a second test of a random figure (a medium) would draw again and make it denser
    if (this.left === this.right) return hitLeft;
    let hitRight = this.right.hit(ray, tmin, tmax, rng);

    if (hitLeft && hitRight) {
      return hitLeft.t < hitRight.t ? hitLeft : hitRight;
    }

    return hitLeft ?? hitRight;
  }

  boundingBox(): AABB {
    return this.bbox.clone();
  }

  pdfValue(): number {
    return 0;
  }

  random(): Vector3 {
    return NOT_A_LIGHT_DIRECTION.clone();
  }
}
