import { parentPort } from 'node:worker_threads';
import type { ComputationResult, MainToWorkerMessage, WorkerToMainMessage } from './commonTypes.js';
import type { ConfigOptions } from './config.js';
import { createScene } from './createScene.js';
import { createRng, type Random } from './samplers/uniform.js';
import type { TracerScene } from './scene.js';
import type { Tile } from './tile.js';
import { renderTile } from './tracer.js';

if (!parentPort) {
  throw new Error('renderWorker has to be started as a worker thread');
}

const port = parentPort;

let workerIndex = -1;
let options: ConfigOptions;
let scene: TracerScene;
let rng: Random;

function compute(taskIndex: number, tile: Tile, samples: number): void {
  let data = renderTile(
    scene,
    tile,
    { width: options.width, height: options.height },
    samples,
    rng,
    options.maxDepth
  );

  let result: ComputationResult = {
    type: 'computation-result',
    workerIndex,
    taskIndex,
    tile,
    samples,
    data
  };

  port.postMessage(result, [data.buffer]);
}

port.on('message', (data: MainToWorkerMessage) => {
  try {
    if (data.type === 'scene-setup') {
      workerIndex = data.workerIndex;
      options = data.options;

      // same seed in every worker: the scene (random placements, BVH axes) has to be
      // identical everywhere, only the sampling rng differs
      scene = createScene(options.scene, {
        aspect: options.width / options.height,
        rng: createRng(`${options.seed}-scene`)
      });
      rng = createRng(`${options.seed}-worker-${workerIndex}`);

      compute(data.taskIndex, data.tile, data.samples);
    } else if (data.type === 'computation-request') {
      compute(data.taskIndex, data.tile, data.samples);
    }
  } catch (error) {
    let message: WorkerToMainMessage = {
      type: 'worker-error',
      workerIndex,
      message: error instanceof Error ? error.message : String(error)
    };
    port.postMessage(message);
  }
});
