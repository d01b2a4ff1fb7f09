import type { Vector3 } from 'three';
import type { Rng } from '../samplers/uniform.js';
import { PDF_TYPE, type DirectionSampler, type Pdf } from './pdf.js';

// equal-weight mixture of two strategies
export class MixPdf implements DirectionSampler {
  readonly type = PDF_TYPE.MIX;

  constructor(
    public p0: Pdf,
    public p1: Pdf
  ) {}

  value(direction: Vector3): number {
    return 0.5 * this.p0.value(direction) + 0.5 * this.p1.value(direction);
  }

  generate(rng: Rng): Vector3 {
    if (rng.float() < 0.5) {
      return this.p0.generate(rng);
    } else {
      return this.p1.generate(rng);
    }
  }
}
