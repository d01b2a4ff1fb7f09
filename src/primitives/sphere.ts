import { Vector3 } from 'three';
import { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import { ONB } from '../geometry/onb.js';
import { Ray } from '../geometry/ray.js';
import type { Rng } from '../samplers/uniform.js';
import { randomToSphere } from '../utils/math.js';
import { FIGURE_TYPE, type Hittable } from './primitive.js';

export class Sphere implements Hittable {
  readonly type = FIGURE_TYPE.SPHERE;

  constructor(
    public center: Vector3,
    public radius: number
  ) {}

  hit(ray: Ray, tmin: number, tmax: number): HitRecord | null {
    let OC = ray.origin.clone().sub(this.center);

    // a t^2 + 2 b t + c = 0
    let a = ray.direction.dot(ray.direction);
    let b = OC.dot(ray.direction);
    let c = OC.dot(OC) - this.radius * this.radius;
    let delta = b * b - a * c;

    if (delta <= 0) return null;

    let sqrtDelta = Math.sqrt(delta);

    let t = (-b - sqrtDelta) / a;
    if (!(tmin < t && t < tmax)) {
      t = (-b + sqrtDelta) / a;
      if (!(tmin < t && t < tmax)) return null;
    }

    let point = ray.at(t);

    return {
      t,
      point,
      // dividing by the signed radius lets a negative radius model a hollow sphere
      normal: point.clone().sub(this.center).divideScalar(this.radius),
      // spheres carry no surface parametrization: textures on spheres read `point`
      u: 1,
      v: 1
    };
  }

  boundingBox(): AABB {
    let r = Math.abs(this.radius);
    let extent = new Vector3(r, r, r);
    return new AABB(this.center.clone().sub(extent), this.center.clone().add(extent));
  }

  pdfValue(origin: Vector3, direction: Vector3): number {
    if (!this.hit(new Ray(origin, direction), 0.001, Infinity)) return 0;

    let distanceSquared = this.center.clone().sub(origin).lengthSq();
    let cosThetaMax = Math.sqrt(1 - (this.radius * this.radius) / distanceSquared);
    let solidAngle = 2 * Math.PI * (1 - cosThetaMax);

    return 1 / solidAngle;
  }

  random(origin: Vector3, rng: Rng): Vector3 {
    let direction = this.center.clone().sub(origin);
    let distanceSquared = direction.lengthSq();
    let uvw = new ONB(direction);
    return uvw.local(randomToSphere(this.radius, distanceSquared, rng));
  }
}
