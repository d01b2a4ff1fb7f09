import { Vector3 } from 'three';
import type { AABB } from '../geometry/aabb.js';
import type { HitRecord } from '../geometry/intersection.js';
import type { Ray } from '../geometry/ray.js';
import type { BvhNode } from '../geometry/bvh.js';
import type { Rng } from '../samplers/uniform.js';
import type { ConstantMedium } from './constantMedium.js';
import type { Cuboid } from './cuboid.js';
import type { Entity } from './entity.js';
import type { FlipNormals } from './flipNormals.js';
import type { Group } from './group.js';
import type { XYRect, XZRect, YZRect } from './rect.js';
import type { RotateY } from './rotateY.js';
import type { Sphere } from './sphere.js';
import type { Translate } from './translate.js';

export enum FIGURE_TYPE {
  SPHERE = 0,
  XY_RECT = 1,
  YZ_RECT = 2,
  XZ_RECT = 3,
  FLIP_NORMALS = 4,
  CUBOID = 5,
  TRANSLATE = 6,
  ROTATE_Y = 7,
  CONSTANT_MEDIUM = 8,
  GROUP = 9,
  BVH_NODE = 10,
  ENTITY = 11
}

export interface Hittable {
  readonly type: FIGURE_TYPE;

  // nearest intersection with tmin < t < tmax
  hit(ray: Ray, tmin: number, tmax: number, rng: Rng): HitRecord | null;

  boundingBox(): AABB | null;

  // solid-angle density of picking `direction` from `origin` when this figure
  // is sampled as a light. Figures that are never used as lights return 0
  pdfValue(origin: Vector3, direction: Vector3): number;

  // direction from `origin` toward a point sampled on the figure
  random(origin: Vector3, rng: Rng): Vector3;
}

export type Figure =
  | Sphere
  | XYRect
  | YZRect
  | XZRect
  | FlipNormals
  | Cuboid
  | Translate
  | RotateY
  | ConstantMedium
  | Group
  | BvhNode
  | Entity;

export type FigureStats = {
  nodesCount: number;
  leavesCount: number;
  maxDepth: number;
};

export function getFigureStats(figure: Figure, depth = 0): FigureStats {
  switch (figure.type) {
    case FIGURE_TYPE.SPHERE:
    case FIGURE_TYPE.XY_RECT:
    case FIGURE_TYPE.YZ_RECT:
    case FIGURE_TYPE.XZ_RECT:
      return { nodesCount: 1, leavesCount: 1, maxDepth: depth };
    case FIGURE_TYPE.FLIP_NORMALS:
    case FIGURE_TYPE.TRANSLATE:
    case FIGURE_TYPE.ROTATE_Y:
    case FIGURE_TYPE.ENTITY:
      return addNode(getFigureStats(figure.figure, depth + 1));
    case FIGURE_TYPE.CONSTANT_MEDIUM:
      return addNode(getFigureStats(figure.boundary, depth + 1));
    case FIGURE_TYPE.CUBOID:
      return addNode(getFigureStats(figure.sides, depth + 1));
    case FIGURE_TYPE.GROUP:
      return addNode(mergeStats(figure.figures.map((f) => getFigureStats(f, depth + 1)), depth));
    case FIGURE_TYPE.BVH_NODE:
      return addNode(
        mergeStats([getFigureStats(figure.left, depth + 1), getFigureStats(figure.right, depth + 1)], depth)
      );
    default: {
      const unreachable: never = figure;
      throw new Error(`unknown figure ${JSON.stringify(unreachable)}`);
    }
  }
}

function addNode(stats: FigureStats): FigureStats {
  return { ...stats, nodesCount: stats.nodesCount + 1 };
}

function mergeStats(list: FigureStats[], depth: number): FigureStats {
  return list.reduce(
    (acc, s) => ({
      nodesCount: acc.nodesCount + s.nodesCount,
      leavesCount: acc.leavesCount + s.leavesCount,
      maxDepth: Math.max(acc.maxDepth, s.maxDepth)
    }),
    { nodesCount: 0, leavesCount: 0, maxDepth: depth }
  );
}

// lights are only ever sampled through shapes that override these
export const NOT_A_LIGHT_DIRECTION = new Vector3(1, 0, 0);
