import { Vector3 } from 'three';
import { createNoise3D, type NoiseFunction3D } from 'simplex-noise';
import type { Rng } from '../samplers/uniform.js';

export interface Texture {
  value(u: number, v: number, point: Vector3): Vector3;
}

export class SolidTexture implements Texture {
  constructor(public color: Vector3) {}

  value(): Vector3 {
    return this.color.clone();
  }
}

// 3D checker pattern, picked by the sign of sin(sx) sin(sy) sin(sz)
export class CheckerTexture implements Texture {
  constructor(
    public odd: Texture,
    public even: Texture,
    public scale: number = 10
  ) {}

  value(u: number, v: number, point: Vector3): Vector3 {
    let sines =
      Math.sin(this.scale * point.x) * Math.sin(this.scale * point.y) * Math.sin(this.scale * point.z);

    if (sines < 0) {
      return this.odd.value(u, v, point);
    } else {
      return this.even.value(u, v, point);
    }
  }
}

export class NoiseTexture implements Texture {
  private noise3D: NoiseFunction3D;

  constructor(
    public scale: number,
    rng: Rng
  ) {
    // the permutation table is drawn from the scene rng, so every worker
    // building the same scene gets the same noise
    this.noise3D = createNoise3D(() => rng.float());
  }

  value(u: number, v: number, point: Vector3): Vector3 {
    let n = this.noise3D(point.x * this.scale, point.y * this.scale, point.z * this.scale);
    let grey = n * 0.5 + 0.5;
    return new Vector3(grey, grey, grey);
  }
}
