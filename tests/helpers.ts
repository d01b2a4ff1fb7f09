import { expect } from 'vitest';
import type { Vector3 } from 'three';
import type { Rng } from '../src/samplers/uniform.js';

// a generator that replays `values` in a loop
export function sequenceRng(values: number[]): Rng {
  let i = 0;
  return {
    float: () => {
      let value = values[i % values.length];
      i++;
      return value;
    }
  };
}

export function constantRng(value: number): Rng {
  return { float: () => value };
}

export function expectVectorClose(actual: Vector3, expected: [number, number, number], digits = 6) {
  expect(actual.x).toBeCloseTo(expected[0], digits);
  expect(actual.y).toBeCloseTo(expected[1], digits);
  expect(actual.z).toBeCloseTo(expected[2], digits);
}
