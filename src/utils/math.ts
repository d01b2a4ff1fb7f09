import { Vector3 } from 'three';
import type { Rng } from '../samplers/uniform.js';

export function vec3(x: number, y: number, z: number) {
  return new Vector3(x, y, z);
}

export function clamp(val: number, low: number, high: number) {
  if (val < low) return low;
  else if (val > high) return high;
  else return val;
}

export function degToRad(degrees: number) {
  return (Math.PI / 180) * degrees;
}

export function reflect(v: Vector3, n: Vector3): Vector3 {
  return v.clone().addScaledVector(n, -2 * v.dot(n));
}

// rejection sampling inside the [-1, 1]^3 cube
export function randomInUnitSphere(rng: Rng): Vector3 {
  let p = new Vector3();
  do {
    p.set(rng.float() * 2 - 1, rng.float() * 2 - 1, rng.float() * 2 - 1);
  } while (p.lengthSq() >= 1);
  return p;
}

export function randomInUnitDisk(rng: Rng): Vector3 {
  let p = new Vector3();
  do {
    p.set(rng.float() * 2 - 1, rng.float() * 2 - 1, 0);
  } while (p.lengthSq() >= 1);
  return p;
}

// cosine-weighted direction around +Z
export function randomCosineDirection(rng: Rng): Vector3 {
  let r1 = rng.float();
  let r2 = rng.float();
  let z = Math.sqrt(1 - r2);
  let phi = 2 * Math.PI * r1;
  let x = Math.cos(phi) * Math.sqrt(r2);
  let y = Math.sin(phi) * Math.sqrt(r2);
  return new Vector3(x, y, z);
}

// uniform direction inside the cone that a sphere of the given radius subtends
// when seen from distanceSquared away, around +Z
export function randomToSphere(radius: number, distanceSquared: number, rng: Rng): Vector3 {
  let r1 = rng.float();
  let r2 = rng.float();
  let z = 1 + r2 * (Math.sqrt(1 - (radius * radius) / distanceSquared) - 1);
  let phi = 2 * Math.PI * r1;
  let x = Math.cos(phi) * Math.sqrt(1 - z * z);
  let y = Math.sin(phi) * Math.sqrt(1 - z * z);
  return new Vector3(x, y, z);
}

// NaN and +-Infinity channels become 0
export function deNaN(color: Vector3): Vector3 {
  if (!Number.isFinite(color.x)) color.x = 0;
  if (!Number.isFinite(color.y)) color.y = 0;
  if (!Number.isFinite(color.z)) color.z = 0;
  return color;
}
