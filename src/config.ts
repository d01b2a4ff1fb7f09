import { get } from 'svelte/store';
import { EventHandler } from './eventHandler.js';
import { configOptions } from './stores/main.js';

// kept serializable, it's posted as-is to the render workers
export type ConfigOptions = {
  scene: string;
  width: number;
  height: number;
  samplesPerPixel: number;
  // samples a worker computes for a tile before reporting back
  samplesPerTask: number;
  maxDepth: number;
  workersCount: number;
  tileSize: number;
  seed: string;
  output: string;
  verbose: boolean;
};

type ConfigEvents = {
  'config-update': ConfigOptions;
};

const POSITIVE_INTEGER_KEYS = [
  'width',
  'height',
  'samplesPerPixel',
  'samplesPerTask',
  'maxDepth',
  'workersCount',
  'tileSize'
] as const;

export function validateConfigOptions(options: ConfigOptions): void {
  for (let key of POSITIVE_INTEGER_KEYS) {
    let value = options[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new Error(`Invalid config option "${key}": expected a positive integer, got ${value}`);
    }
  }

  if (options.seed.length === 0) {
    throw new Error('Invalid config option "seed": expected a non-empty string');
  }
}

export class ConfigManager {
  public options: ConfigOptions;
  public prevOptions: ConfigOptions;
  public e: EventHandler<ConfigEvents>;

  constructor() {
    this.options = get(configOptions);
    this.prevOptions = this.options;
    this.e = new EventHandler<ConfigEvents>();

    configOptions.subscribe((value) => {
      this.options = value;
      this.prevOptions = configOptions.getOldValue();

      this.e.fireEvent('config-update', this.options);
    });
  }

  // throws, leaving the store untouched, if the merged options are invalid
  setStoreProperty(props: Partial<ConfigOptions>) {
    let options = { ...this.options, ...props };
    validateConfigOptions(options);
    configOptions.set(options);
  }
}

export const configManager = new ConfigManager();
