import { describe, it, expect } from 'vitest';
import { Camera } from '../src/camera.js';
import { createScene } from '../src/createScene.js';
import { Ray } from '../src/geometry/ray.js';
import { DiffuseLight } from '../src/materials/diffuseLight.js';
import { Lambertian } from '../src/materials/lambertian.js';
import { Sphere } from '../src/primitives/sphere.js';
import { renderSync } from '../src/renderer.js';
import { createRng } from '../src/samplers/uniform.js';
import { buildWorld, type Background, type TracerScene } from '../src/scene.js';
import { defaultConfigOptions } from '../src/stores/main.js';
import { SolidTexture } from '../src/textures/texture.js';
import { backgroundRadiance, color, renderTile, samplePixel } from '../src/tracer.js';
import { deNaN, vec3 } from '../src/utils/math.js';
import { constantRng, expectVectorClose } from './helpers.js';

const camera = new Camera({ lookFrom: vec3(0, 0, 0), lookAt: vec3(0, 0, -1), vfov: 90, aspect: 2 });

function sceneWith(sphere: Sphere, material: Lambertian | DiffuseLight, background: Background): TracerScene {
  let { world, materials } = buildWorld([{ figure: sphere, material }], createRng('tracer'));
  return { world, materials, lightShape: null, camera, background };
}

describe('deNaN', () => {
  it('zeroes NaN and infinite channels', () => {
    expectVectorClose(deNaN(vec3(NaN, Infinity, 0.5)), [0, 0, 0.5]);
    expectVectorClose(deNaN(vec3(-Infinity, 2, NaN)), [0, 2, 0]);
  });
});

describe('backgroundRadiance', () => {
  it('blends white to blue on the way up', () => {
    let sky: Background = { type: 'sky' };
    expectVectorClose(backgroundRadiance(sky, new Ray(vec3(0, 0, 0), vec3(0, 3, 0))), [0.5, 0.7, 1]);
    expectVectorClose(backgroundRadiance(sky, new Ray(vec3(0, 0, 0), vec3(0, -1, 0))), [1, 1, 1]);
    expectVectorClose(backgroundRadiance(sky, new Ray(vec3(0, 0, 0), vec3(1, 0, 0))), [0.75, 0.85, 1]);
  });

  it('returns a copy of a solid color', () => {
    let solid: Background = { type: 'solid', color: vec3(0.1, 0.2, 0.3) };
    let value = backgroundRadiance(solid, new Ray(vec3(0, 0, 0), vec3(0, 0, 1)));
    value.multiplyScalar(0);
    expectVectorClose(backgroundRadiance(solid, new Ray(vec3(0, 0, 0), vec3(0, 0, 1))), [0.1, 0.2, 0.3]);
  });
});

describe('color', () => {
  let grey = new Lambertian(new SolidTexture(vec3(0.5, 0.5, 0.5)));

  it('returns the background on a miss', () => {
    let scene = sceneWith(new Sphere(vec3(0, 0, -5), 1), grey, { type: 'solid', color: vec3(0.2, 0.4, 0.6) });
    let radiance = color(new Ray(vec3(0, 0, 0), vec3(0, 1, 0)), scene, 0, constantRng(0.5));
    expectVectorClose(radiance, [0.2, 0.4, 0.6]);
  });

  it('returns the emission of a light', () => {
    let light = new DiffuseLight(new SolidTexture(vec3(4, 4, 4)));
    let scene = sceneWith(new Sphere(vec3(0, 0, -5), 1), light, { type: 'sky' });
    let radiance = color(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), scene, 0, constantRng(0.5));
    expectVectorClose(radiance, [4, 4, 4]);
  });

  it('stops recursing at the maximum depth', () => {
    let scene = sceneWith(new Sphere(vec3(0, 0, -5), 1), grey, { type: 'sky' });
    let ray = new Ray(vec3(0, 0, 0), vec3(0, 0, -1));

    expectVectorClose(color(ray, scene, 50, constantRng(0.5)), [0, 0, 0]);
    expectVectorClose(color(ray, scene, 3, constantRng(0.5), 3), [0, 0, 0]);
  });

  it('throws when a hit carries no material', () => {
    let scene: TracerScene = {
      world: new Sphere(vec3(0, 0, -5), 1),
      materials: [grey],
      lightShape: null,
      camera,
      background: { type: 'sky' }
    };

    expect(() => color(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), scene, 0, constantRng(0.5))).toThrow(
      "which the scene doesn't define"
    );
  });
});

describe('renderTile', () => {
  it('sums the samples of every pixel of the tile', () => {
    // the sphere sits behind the camera, every ray sees the background
    let scene = sceneWith(new Sphere(vec3(0, 0, 100), 1), new Lambertian(new SolidTexture(vec3(1, 1, 1))), {
      type: 'solid',
      color: vec3(1, 0.5, 0.25)
    });

    let data = renderTile(scene, { x: 0, y: 0, w: 2, h: 1 }, { width: 2, height: 1 }, 3, createRng('tile'));

    expect(Array.from(data)).toEqual([3, 1.5, 0.75, 3, 1.5, 0.75]);
  });
});

describe('renderSync', () => {
  it('gives every pixel the requested samples', () => {
    let scene = sceneWith(new Sphere(vec3(0, 0, 100), 1), new Lambertian(new SolidTexture(vec3(1, 1, 1))), {
      type: 'solid',
      color: vec3(0.25, 0.25, 0.25)
    });
    let options = {
      ...defaultConfigOptions,
      width: 4,
      height: 2,
      samplesPerPixel: 5,
      samplesPerTask: 2,
      tileSize: 3
    };

    let result = renderSync(scene, options, createRng('sync'));

    expect(result.samplesPerPixel).toBe(5);
    expect(result.stopped).toBe(false);
    expect(Array.from(result.sampleCounts)).toEqual([5, 5, 5, 5, 5, 5, 5, 5]);
    expect(result.pixels.length).toBe(24);
    expect(result.pixels.every((channel) => channel === 127)).toBe(true);
  });
});

describe('convergence', () => {
  function estimatorVariance(samples: number, runs: number): number {
    let scene = createScene('single-sphere', { aspect: 1, rng: createRng('convergence-scene') });
    let rng = createRng(`convergence-${samples}`);
    let canvasSize = { width: 8, height: 8 };
    let estimates: number[] = [];

    for (let r = 0; r < runs; r++) {
      let sum = 0;
      for (let s = 0; s < samples; s++) {
        sum += samplePixel(scene, 4, 4, canvasSize, rng).x;
      }
      estimates.push(sum / samples);
    }

    let mean = estimates.reduce((a, b) => a + b, 0) / runs;
    return estimates.reduce((acc, e) => acc + (e - mean) * (e - mean), 0) / (runs - 1);
  }

  it('pixel variance shrinks going from 16 to 256 samples', () => {
    let v16 = estimatorVariance(16, 24);
    let v256 = estimatorVariance(256, 24);

    expect(v16).toBeGreaterThan(0);
    expect(v256).toBeLessThan(v16);
  });
});
