import random from 'random';

export type Random = typeof random;

// the only thing the tracer ever asks of a generator: a uniform float in [0, 1)
export type Rng = Pick<Random, 'float'>;

// every worker owns its own generator, so two workers seeded differently never
// share state and a given seed always reproduces the same samples
export function createRng(seedString: string = 'seed-string'): Random {
  return random.clone(seedString);
}
