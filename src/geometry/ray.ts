import { Vector3 } from 'three';

// direction is not normalized: every consumer of a Ray works with the parametric
// distance t, and the few places that need a world-space length scale by |direction|
export class Ray {
  constructor(
    public origin: Vector3,
    public direction: Vector3
  ) {}

  at(t: number): Vector3 {
    return this.origin.clone().addScaledVector(this.direction, t);
  }

  clone(): Ray {
    return new Ray(this.origin.clone(), this.direction.clone());
  }
}
