import { Vector3 } from 'three';

export class ONB {
  public u: Vector3;
  public v: Vector3;
  public w: Vector3;

  constructor(n: Vector3) {
    this.w = n.clone().normalize();
    let a = Math.abs(this.w.x) > 0.9 ? new Vector3(0, 1, 0) : new Vector3(1, 0, 0);
    this.v = this.w.clone().cross(a).normalize();
    this.u = this.w.clone().cross(this.v);
  }

  local(a: Vector3): Vector3 {
    return this.u
      .clone()
      .multiplyScalar(a.x)
      .addScaledVector(this.v, a.y)
      .addScaledVector(this.w, a.z);
  }
}
