import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { get } from 'svelte/store';
import { configManager, type ConfigOptions } from './config.js';
import { sceneNames } from './createScene.js';
import { encodePPM } from './display.js';
import type { FigureStats } from './primitives/primitive.js';
import { Renderer } from './renderer.js';
import { bvhInfo, samplesInfo } from './stores/main.js';

export type ParsedArgs = {
  options: Partial<ConfigOptions>;
  help: boolean;
};

export const usage = `Usage: mc-pathtracer [options]

  --scene <name>      one of: ${sceneNames.join(', ')}
  --width <px>        image width
  --height <px>       image height
  --samples <n>       samples per pixel (alias: --spp)
  --depth <n>         maximum scattering depth
  --workers <n>       render worker threads
  --tile <px>         tile size
  --seed <string>     random seed
  --output <path>     PPM file to write
  --verbose           log every tile as it comes back, and the BVH stats
  --help, -h          show this message
`;

export function parseCliArgs(args: string[]): ParsedArgs {
  let options: Partial<ConfigOptions> = {};
  let help = false;

  for (let index = 0; index < args.length; index += 1) {
    const flag = args[index];
    switch (flag) {
      case '--':
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--scene': {
        options.scene = consumeNextValue(args, flag, index);
        index += 1;
        break;
      }
      case '--width': {
        options.width = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 1);
        index += 1;
        break;
      }
      case '--height': {
        options.height = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 1);
        index += 1;
        break;
      }
      case '--spp':
      case '--samples': {
        options.samplesPerPixel = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 1);
        index += 1;
        break;
      }
      case '--depth': {
        options.maxDepth = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 1);
        index += 1;
        break;
      }
      case '--workers': {
        options.workersCount = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 1);
        index += 1;
        break;
      }
      case '--tile': {
        options.tileSize = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 1);
        index += 1;
        break;
      }
      case '--seed': {
        options.seed = consumeNextValue(args, flag, index);
        index += 1;
        break;
      }
      case '--output': {
        options.output = consumeNextValue(args, flag, index);
        index += 1;
        break;
      }
      default:
        throw new Error(`Unknown CLI argument '${flag}'. Use --help.`);
    }
  }

  return { options, help };
}

function consumeNextValue(args: string[], flag: string, index: number): string {
  if (index + 1 >= args.length) {
    throw new Error(`Missing value for ${flag}`);
  }
  return args[index + 1];
}

function parseIntAtLeast(value: string, flag: string, min: number): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new Error(`${flag} must be an integer, got '${value}'`);
  }

  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new Error(`${flag} must be an integer >= ${min}, got '${value}'`);
  }
  return parsed;
}

export function formatRenderStats(stats: FigureStats, tilesCount: number): string {
  return `bvh: ${stats.nodesCount} nodes, ${stats.leavesCount} leaves, depth ${stats.maxDepth}; tiles: ${tilesCount}`;
}

export async function main(args: string[]): Promise<void> {
  const parsed = parseCliArgs(args);
  if (parsed.help) {
    console.log(usage);
    return;
  }

  configManager.setStoreProperty(parsed.options);
  const options = configManager.options;
  const outputPath = path.resolve(options.output);

  console.log(
    `Rendering '${options.scene}' at ${options.width}x${options.height}, ${options.samplesPerPixel} spp, ${options.workersCount} workers`
  );

  const renderer = new Renderer(options);
  const onInterrupt = () => {
    console.log('Interrupted, waiting for the tiles in flight');
    renderer.stop();
  };
  process.once('SIGINT', onInterrupt);

  let lastCount = -1;
  const unsubscribe = samplesInfo.subscribe((info) => {
    if (info.count === lastCount) return;
    lastCount = info.count;
    console.log(`samples: ${info.count} / ${info.limit}`);
  });

  try {
    const result = await renderer.start();
    await writeFile(outputPath, encodePPM(result.pixels, result.canvasSize));

    const seconds = (result.ms / 1000).toFixed(2);
    const stoppedNote = result.stopped ? ' (stopped early)' : '';
    console.log(`Wrote ${outputPath}: ${result.samplesPerPixel} spp in ${seconds}s${stoppedNote}`);
    if (options.verbose) {
      console.log(formatRenderStats(get(bvhInfo), samplesInfo.tilesCount));
    }
  } finally {
    unsubscribe();
    process.off('SIGINT', onInterrupt);
  }
}
