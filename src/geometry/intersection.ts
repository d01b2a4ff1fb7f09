import type { Vector3 } from 'three';

export type HitRecord = {
  t: number;
  point: Vector3;
  // unit length, oriented as the figure defines it (outward for spheres, fixed axis for rects)
  normal: Vector3;
  u: number;
  v: number;
  // set by the Entity the hit went through, indexes the scene's materials
  materialIndex?: number;
};
