import { Vector3 } from 'three';
import { Ray } from './geometry/ray.js';
import type { Rng } from './samplers/uniform.js';
import { degToRad, randomInUnitDisk } from './utils/math.js';

export type CameraOptions = {
  lookFrom: Vector3;
  lookAt: Vector3;
  vup?: Vector3;
  // vertical field of view, in degrees
  vfov: number;
  aspect: number;
  aperture?: number;
  focusDistance?: number;
};

export class Camera {
  public origin: Vector3;
  public lowerLeftCorner: Vector3;
  public horizontal: Vector3;
  public vertical: Vector3;
  public u: Vector3;
  public v: Vector3;
  public w: Vector3;
  public lensRadius: number;

  constructor({
    lookFrom,
    lookAt,
    vup = new Vector3(0, 1, 0),
    vfov,
    aspect,
    aperture = 0,
    focusDistance = 1
  }: CameraOptions) {
    let halfHeight = Math.tan(degToRad(vfov) / 2);
    let halfWidth = aspect * halfHeight;

    this.lensRadius = aperture / 2;
    this.origin = lookFrom.clone();
    this.w = lookFrom.clone().sub(lookAt).normalize();
    this.u = vup.clone().cross(this.w).normalize();
    this.v = this.w.clone().cross(this.u);

    this.horizontal = this.u.clone().multiplyScalar(2 * halfWidth * focusDistance);
    this.vertical = this.v.clone().multiplyScalar(2 * halfHeight * focusDistance);
    this.lowerLeftCorner = this.origin
      .clone()
      .addScaledVector(this.u, -halfWidth * focusDistance)
      .addScaledVector(this.v, -halfHeight * focusDistance)
      .addScaledVector(this.w, -focusDistance);
  }

  // s, t in [0, 1], (0, 0) is the bottom-left corner of the image
  getRay(s: number, t: number, rng: Rng): Ray {
    let offset = new Vector3();
    if (this.lensRadius > 0) {
      let rd = randomInUnitDisk(rng).multiplyScalar(this.lensRadius);
      offset.copy(this.u).multiplyScalar(rd.x).addScaledVector(this.v, rd.y);
    }

    let origin = this.origin.clone().add(offset);
    let direction = this.lowerLeftCorner
      .clone()
      .addScaledVector(this.horizontal, s)
      .addScaledVector(this.vertical, t)
      .sub(origin);

    return new Ray(origin, direction);
  }
}
