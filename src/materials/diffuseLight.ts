import type { Vector3 } from 'three';
import type { Texture } from '../textures/texture.js';
import { absorbed, BaseMaterial, MATERIAL_TYPE, type ScatterRecord } from './material.js';

export class DiffuseLight extends BaseMaterial {
  readonly type = MATERIAL_TYPE.DIFFUSE_LIGHT;

  constructor(public emit: Texture) {
    super();
  }

  scatter(): ScatterRecord {
    return absorbed();
  }

  emitted(u: number, v: number, point: Vector3): Vector3 {
    return this.emit.value(u, v, point);
  }
}
