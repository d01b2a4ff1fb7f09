import type { ConfigOptions } from './config.js';
import type { Tile } from './tile.js';

export type SceneSetupMessage = {
  type: 'scene-setup';
  workerIndex: number;
  options: ConfigOptions;
  // first task, computed as soon as the scene is built
  taskIndex: number;
  tile: Tile;
  samples: number;
};

export type ComputationRequest = {
  type: 'computation-request';
  taskIndex: number;
  tile: Tile;
  samples: number;
};

export type ComputationResult = {
  type: 'computation-result';
  workerIndex: number;
  taskIndex: number;
  tile: Tile;
  samples: number;
  data: Float32Array<ArrayBuffer>;
};

export type WorkerErrorMessage = {
  type: 'worker-error';
  workerIndex: number;
  message: string;
};

export type MainToWorkerMessage = SceneSetupMessage | ComputationRequest;
export type WorkerToMainMessage = ComputationResult | WorkerErrorMessage;
