import { Vector3 } from 'three';
import { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { degToRad } from '../utils/math.js';
import { FIGURE_TYPE, type Figure, type Hittable } from './primitive.js';

export class RotateY implements Hittable {
  readonly type = FIGURE_TYPE.ROTATE_Y;

  public sinTheta: number;
  public cosTheta: number;
  private bbox: AABB | null;

  constructor(
    public angle: number,
    public figure: Figure
  ) {
    let radians = degToRad(angle);
    this.sinTheta = Math.sin(radians);
    this.cosTheta = Math.cos(radians);

    let localBox = figure.boundingBox();
    this.bbox = null;

    if (localBox) {
      this.bbox = new AABB();
      for (let i = 0; i < 2; i++) {
        for (let j = 0; j < 2; j++) {
          for (let k = 0; k < 2; k++) {
            let corner = new Vector3(
              i * localBox.max.x + (1 - i) * localBox.min.x,
              j * localBox.max.y + (1 - j) * localBox.min.y,
              k * localBox.max.z + (1 - k) * localBox.min.z
            );
            this.bbox.expand(this.toWorld(corner));
          }
        }
      }
    }
  }

  // world -> local is the inverse rotation
  private toLocal(v: Vector3): Vector3 {
    return new Vector3(
      this.cosTheta * v.x - this.sinTheta * v.z,
      v.y,
      this.sinTheta * v.x + this.cosTheta * v.z
    );
  }

  private toWorld(v: Vector3): Vector3 {
    return new Vector3(
      this.cosTheta * v.x + this.sinTheta * v.z,
      v.y,
      -this.sinTheta * v.x + this.cosTheta * v.z
    );
  }

  hit(ray: Ray, tmin: number, tmax: number, rng: Rng): HitRecord | null {
    let rotatedRay = new Ray(this.toLocal(ray.origin), this.toLocal(ray.direction));

    let rec = this.figure.hit(rotatedRay, tmin, tmax, rng);
    if (!rec) return null;

    rec.point = this.toWorld(rec.point);
    rec.normal = this.toWorld(rec.normal);
    return rec;
  }

  boundingBox(): AABB | null {
    return this.bbox ? this.bbox.clone() : null;
  }

  pdfValue(origin: Vector3, direction: Vector3): number {
    return this.figure.pdfValue(this.toLocal(origin), this.toLocal(direction));
  }

  random(origin: Vector3, rng: Rng): Vector3 {
    return this.toWorld(this.figure.random(this.toLocal(origin), rng));
  }
}
