import { get, writable } from 'svelte/store';
import type { ConfigOptions } from '../config.js';
import type { FigureStats } from '../primitives/primitive.js';

export const defaultConfigOptions: ConfigOptions = {
  scene: 'cornell-box',
  width: 300,
  height: 300,
  samplesPerPixel: 64,
  samplesPerTask: 4,
  maxDepth: 50,
  workersCount: 4,
  tileSize: 32,
  seed: 'seed-string',
  output: 'out.ppm',
  verbose: false
};

// a writable store that also remembers the value it held before the last update
function createConfigStore(initialValue: ConfigOptions) {
  let store = writable<ConfigOptions>(initialValue);
  let oldValue: ConfigOptions = initialValue;

  return {
    subscribe: store.subscribe,
    set(value: ConfigOptions) {
      oldValue = get(store);
      store.set(value);
    },
    getOldValue(): ConfigOptions {
      return oldValue;
    },
    reset() {
      oldValue = initialValue;
      store.set(initialValue);
    }
  };
}

export const configOptions = createConfigStore(defaultConfigOptions);

export const bvhInfo = writable<FigureStats>({ nodesCount: 0, leavesCount: 0, maxDepth: 0 });

type SamplesInfo = {
  // samples per pixel requested
  limit: number;
  // samples every pixel has received so far
  count: number;
  // time spent rendering
  ms: number;
  tilesCount: number;
};

export const samplesInfo = (function createSamplesInfoStore() {
  let store = writable<SamplesInfo>({
    limit: 1,
    count: 0,
    ms: 0,
    tilesCount: 0
  });

  return {
    subscribe: store.subscribe,
    set: store.set,
    update: store.update,
    get count() {
      return get(store).count;
    },
    get limit() {
      return get(store).limit;
    },
    get tilesCount() {
      return get(store).tilesCount;
    },
    setLimit: (value: number) => {
      store.update((si) => {
        si.limit = value;
        return si;
      });
    },
    setCount: (value: number) => {
      store.update((si) => {
        si.count = value;
        return si;
      });
    },
    setPerformance: (value: number) => {
      store.update((si) => {
        si.ms = value;
        return si;
      });
    },
    setTilesCount: (value: number) => {
      store.update((si) => {
        si.tilesCount = value;
        return si;
      });
    },
    reset: () =>
      store.update((si) => {
        si.count = 0;
        si.ms = 0;
        return si;
      })
  };
})();
