import type { Vector3 } from 'three';
import type { Figure } from '../primitives/primitive.js';
import type { Rng } from '../samplers/uniform.js';
import { PDF_TYPE, type DirectionSampler } from './pdf.js';

// samples directions toward a figure, used to aim bounces at the lights
export class HitPdf implements DirectionSampler {
  readonly type = PDF_TYPE.HIT;

  constructor(
    public figure: Figure,
    public origin: Vector3
  ) {}

  value(direction: Vector3): number {
    return this.figure.pdfValue(this.origin, direction);
  }

  generate(rng: Rng): Vector3 {
    return this.figure.random(this.origin, rng);
  }
}
