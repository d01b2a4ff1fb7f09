import type { Vector3 } from 'three';
import type { Rng } from '../samplers/uniform.js';
import type { CosinePdf } from './cosinePdf.js';
import type { HitPdf } from './hitPdf.js';
import type { MixPdf } from './mixPdf.js';

export enum PDF_TYPE {
  COSINE = 0,
  HIT = 1,
  MIX = 2
}

export interface DirectionSampler {
  readonly type: PDF_TYPE;

  // density of `direction` under this strategy
  value(direction: Vector3): number;

  generate(rng: Rng): Vector3;
}

export type Pdf = CosinePdf | HitPdf | MixPdf;
