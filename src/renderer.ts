import { Worker } from 'node:worker_threads';
import type { ComputationRequest, SceneSetupMessage, WorkerToMainMessage } from './commonTypes.js';
import { validateConfigOptions, type ConfigOptions } from './config.js';
import { createScene } from './createScene.js';
import { toneMap } from './display.js';
import { getFigureStats } from './primitives/primitive.js';
import { createRng, type Rng } from './samplers/uniform.js';
import type { TracerScene } from './scene.js';
import { bvhInfo, samplesInfo } from './stores/main.js';
import { TileManager, TileSequence, type Tile } from './tile.js';
import { renderTile, type CanvasSize } from './tracer.js';

export type RenderResult = {
  canvasSize: CanvasSize;
  // summed radiance, 3 floats per pixel, rows top to bottom
  radianceData: Float32Array;
  sampleCounts: Uint32Array;
  // gamma corrected 8 bit RGB
  pixels: Uint8ClampedArray;
  // samples every pixel received, lower than requested when the render was stopped
  samplesPerPixel: number;
  ms: number;
  stopped: boolean;
};

type Task = {
  tile: Tile;
  samples: number;
  pass: number;
};

function canvasSizeOf(options: ConfigOptions): CanvasSize {
  return { width: options.width, height: options.height };
}

// the worker entry sits next to this file, with the same extension: .js once
// built, .ts when running from sources
function defaultWorkerEntry(): URL {
  let extension = new URL(import.meta.url).pathname.endsWith('.ts') ? '.ts' : '.js';
  return new URL(`./renderWorker${extension}`, import.meta.url);
}

// a .ts entry goes through the bootstrap, which registers tsx inside the worker
function spawnWorker(entry: URL): Worker {
  if (entry.pathname.endsWith('.ts')) {
    return new Worker(new URL('./workerBootstrap.mjs', import.meta.url), {
      workerData: { entry: entry.href }
    });
  }
  return new Worker(entry);
}

// every tile gets `samplesPerTask` samples per pass, the last pass gets what's left
export function createTasks(options: ConfigOptions): Task[] {
  let sequence = new TileSequence(canvasSizeOf(options), options.tileSize);
  let passes = Math.ceil(options.samplesPerPixel / options.samplesPerTask);
  let tasks: Task[] = [];

  for (let pass = 0; pass < passes; pass++) {
    let samples = Math.min(options.samplesPerTask, options.samplesPerPixel - pass * options.samplesPerTask);
    for (let i = 0; i < sequence.tilesCount; i++) {
      tasks.push({ tile: sequence.getNextTile(), samples, pass });
    }
  }

  return tasks;
}

function createResult(
  canvasSize: CanvasSize,
  radianceData: Float32Array,
  sampleCounts: Uint32Array,
  ms: number,
  stopped: boolean
): RenderResult {
  let samplesPerPixel = sampleCounts.reduce((min, count) => Math.min(min, count), Infinity);

  return {
    canvasSize,
    radianceData,
    sampleCounts,
    pixels: toneMap(radianceData, sampleCounts, canvasSize),
    samplesPerPixel: Number.isFinite(samplesPerPixel) ? samplesPerPixel : 0,
    ms,
    stopped
  };
}

// renders every tile in the calling thread
export function renderSync(scene: TracerScene, options: ConfigOptions, rng: Rng): RenderResult {
  validateConfigOptions(options);

  let start = performance.now();
  let canvasSize = canvasSizeOf(options);
  let radianceData = new Float32Array(canvasSize.width * canvasSize.height * 3);
  let sampleCounts = new Uint32Array(canvasSize.width * canvasSize.height);

  for (let task of createTasks(options)) {
    let data = renderTile(scene, task.tile, canvasSize, task.samples, rng, options.maxDepth);
    TileManager.addSample(radianceData, sampleCounts, canvasSize, task.tile, data, task.samples);
  }

  return createResult(canvasSize, radianceData, sampleCounts, performance.now() - start, false);
}

export class Renderer {
  private workers: Worker[] = [];
  private stopRequested = false;
  private running = false;

  constructor(
    private options: ConfigOptions,
    private workerEntry: URL = defaultWorkerEntry()
  ) {
    validateConfigOptions(options);
  }

  // hands out no more tiles, the running promise resolves once the tiles being
  // computed come back
  stop() {
    this.stopRequested = true;
  }

  start(): Promise<RenderResult> {
    if (this.running) {
      return Promise.reject(new Error('Renderer is already running'));
    }

    let options = this.options;
    let canvasSize = canvasSizeOf(options);

    // built here once so that a broken scene fails before any worker starts
    let scene: TracerScene;
    try {
      scene = createScene(options.scene, {
        aspect: options.width / options.height,
        rng: createRng(`${options.seed}-scene`)
      });
    } catch (error) {
      return Promise.reject(error);
    }
    bvhInfo.set(getFigureStats(scene.world));

    let tasks = createTasks(options);
    let tilesCount = tasks.filter((task) => task.pass === 0).length;
    let passesDone = new Array<number>(Math.ceil(tasks.length / tilesCount)).fill(0);

    let radianceData = new Float32Array(canvasSize.width * canvasSize.height * 3);
    let sampleCounts = new Uint32Array(canvasSize.width * canvasSize.height);

    this.running = true;
    this.stopRequested = false;
    samplesInfo.reset();
    samplesInfo.setLimit(options.samplesPerPixel);
    samplesInfo.setTilesCount(tilesCount);

    let start = performance.now();
    let nextTask = 0;
    let inFlight = 0;
    let samplesCount = 0;

    return new Promise<RenderResult>((resolve, reject) => {
      let settled = false;

      const finish = (error?: Error) => {
        if (settled) return;
        settled = true;
        this.running = false;
        this.terminateWorkers().then(
          () => {
            if (error) {
              reject(error);
            } else {
              let ms = performance.now() - start;
              samplesInfo.setPerformance(ms);
              resolve(createResult(canvasSize, radianceData, sampleCounts, ms, nextTask < tasks.length));
            }
          },
          (terminateError: unknown) => reject(terminateError)
        );
      };

      const takeTask = (): number | null => {
        if (this.stopRequested || nextTask >= tasks.length) return null;
        inFlight++;
        return nextTask++;
      };

      const onWorkerMessage = (message: WorkerToMainMessage) => {
        if (message.type === 'worker-error') {
          finish(new Error(`Render worker ${message.workerIndex} failed: ${message.message}`));
          return;
        }

        inFlight--;
        TileManager.addSample(
          radianceData,
          sampleCounts,
          canvasSize,
          message.tile,
          message.data,
          message.samples
        );

        let pass = tasks[message.taskIndex].pass;
        passesDone[pass]++;
        if (passesDone[pass] === tilesCount) {
          samplesCount += message.samples;
          samplesInfo.setCount(samplesCount);
        }

        if (options.verbose) {
          console.log(
            `tile (${message.tile.x}, ${message.tile.y}) +${message.samples} samples from worker: ${message.workerIndex}`
          );
        }

        // assign a new task to the worker and let it run again
        let taskIndex = takeTask();
        if (taskIndex !== null) {
          let task = tasks[taskIndex];
          let request: ComputationRequest = {
            type: 'computation-request',
            taskIndex,
            tile: task.tile,
            samples: task.samples
          };
          this.workers[message.workerIndex].postMessage(request);
        } else if (inFlight === 0) {
          finish();
        }
      };

      let workersCount = Math.min(options.workersCount, tasks.length);

      for (let i = 0; i < workersCount; i++) {
        let taskIndex = takeTask();
        if (taskIndex === null) break;
        let task = tasks[taskIndex];

        let worker = spawnWorker(this.workerEntry);
        this.workers.push(worker);

        worker.on('message', onWorkerMessage);
        worker.on('error', (error) => finish(error));
        worker.on('exit', (code) => {
          if (code !== 0) finish(new Error(`Render worker ${i} exited with code ${code}`));
        });

        let setup: SceneSetupMessage = {
          type: 'scene-setup',
          workerIndex: i,
          options,
          taskIndex,
          tile: task.tile,
          samples: task.samples
        };
        worker.postMessage(setup);
      }
    });
  }

  private async terminateWorkers(): Promise<void> {
    let workers = this.workers;
    this.workers = [];
    await Promise.all(workers.map((worker) => worker.terminate()));
  }
}
