import type { Vector3 } from 'three';
import { ONB } from '../geometry/onb.js';
import type { Rng } from '../samplers/uniform.js';
import { randomCosineDirection } from '../utils/math.js';
import { PDF_TYPE, type DirectionSampler } from './pdf.js';

export class CosinePdf implements DirectionSampler {
  readonly type = PDF_TYPE.COSINE;

  public uvw: ONB;

  constructor(normal: Vector3) {
    this.uvw = new ONB(normal);
  }

  value(direction: Vector3): number {
    let cosine = direction.clone().normalize().dot(this.uvw.w);
    return cosine > 0 ? cosine / Math.PI : 0;
  }

  generate(rng: Rng): Vector3 {
    return this.uvw.local(randomCosineDirection(rng));
  }
}
