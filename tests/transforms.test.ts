import { describe, it, expect } from 'vitest';
import { Ray } from '../src/geometry/ray.js';
import { Cuboid } from '../src/primitives/cuboid.js';
import { Entity } from '../src/primitives/entity.js';
import { FlipNormals } from '../src/primitives/flipNormals.js';
import { Group } from '../src/primitives/group.js';
import { XZRect } from '../src/primitives/rect.js';
import { RotateY } from '../src/primitives/rotateY.js';
import { Sphere } from '../src/primitives/sphere.js';
import { Translate } from '../src/primitives/translate.js';
import { createRng } from '../src/samplers/uniform.js';
import { vec3 } from '../src/utils/math.js';
import { constantRng, expectVectorClose } from './helpers.js';

const nowhere = vec3(NaN, NaN, NaN);
const rng = constantRng(0.5);

describe('Translate', () => {
  it('agrees with the child built at the shifted position', () => {
    let moved = new Translate(vec3(10, 0, 0), new Sphere(vec3(0, 0, 0), 1));
    let reference = new Sphere(vec3(10, 0, 0), 1);
    let ray = new Ray(vec3(10.2, 0.3, 5), vec3(0, 0, -1));

    let a = moved.hit(ray, 0.001, Infinity, rng);
    let b = reference.hit(ray, 0.001, Infinity);

    expect(a?.t).toBeCloseTo(b?.t ?? NaN, 10);
    expectVectorClose(a?.point ?? nowhere, [b?.point.x ?? NaN, b?.point.y ?? NaN, b?.point.z ?? NaN]);
    expectVectorClose(a?.normal ?? nowhere, [b?.normal.x ?? NaN, b?.normal.y ?? NaN, b?.normal.z ?? NaN]);
  });

  it('shifts the bounding box', () => {
    let box = new Translate(vec3(10, 0, 0), new Sphere(vec3(0, 0, 0), 1)).boundingBox();
    expectVectorClose(box?.min ?? nowhere, [9, -1, -1]);
    expectVectorClose(box?.max ?? nowhere, [11, 1, 1]);
  });

  it('samples lights from the shifted origin', () => {
    let light = new Translate(vec3(0, 10, 0), new XZRect(-1, 1, -1, 1, 2));
    // the rect sits at y = 12 in world space
    expect(light.pdfValue(vec3(0, 0, 0), vec3(0, 1, 0))).toBeCloseTo(144 / 4, 8);
    expect(light.random(vec3(0, 0, 0), rng).y).toBe(12);
  });
});

describe('RotateY', () => {
  it('is the identity at 0 degrees', () => {
    let sphere = new Sphere(vec3(0, 0, 0), 1);
    let rotated = new RotateY(0, sphere);
    let ray = new Ray(vec3(0.3, 0.2, 5), vec3(0, 0, -1));

    let a = rotated.hit(ray, 0.001, Infinity, rng);
    let b = sphere.hit(ray, 0.001, Infinity);

    expect(a?.t).toBeCloseTo(b?.t ?? NaN, 10);
    expectVectorClose(a?.point ?? nowhere, [b?.point.x ?? NaN, b?.point.y ?? NaN, b?.point.z ?? NaN]);
    expectVectorClose(a?.normal ?? nowhere, [b?.normal.x ?? NaN, b?.normal.y ?? NaN, b?.normal.z ?? NaN]);
  });

  it('rotates the hit point and normal by 90 degrees', () => {
    // the child sphere sits on +X, +X turns into -Z
    let rotated = new RotateY(90, new Sphere(vec3(1, 0, 0), 0.5));
    let rec = rotated.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), 0.001, Infinity, rng);

    expect(rec?.t).toBeCloseTo(0.5, 10);
    expectVectorClose(rec?.point ?? nowhere, [0, 0, -0.5]);
    expectVectorClose(rec?.normal ?? nowhere, [0, 0, 1]);
  });

  it('bounding box covers the rotated corners', () => {
    let box = new RotateY(90, new Cuboid(vec3(0, 0, 0), vec3(1, 2, 3))).boundingBox();
    expectVectorClose(box?.min ?? nowhere, [0, 0, -1]);
    expectVectorClose(box?.max ?? nowhere, [3, 2, 0]);
  });

  it('has no box when the child has none', () => {
    expect(new RotateY(30, new Group([])).boundingBox()).toBeNull();
  });
});

describe('FlipNormals', () => {
  it('negates the normal once and restores it twice', () => {
    let sphere = new Sphere(vec3(0, 0, -5), 1);
    let ray = new Ray(vec3(0, 0, 0), vec3(0, 0, -1));

    let flipped = new FlipNormals(sphere).hit(ray, 0.001, Infinity, rng);
    let twice = new FlipNormals(new FlipNormals(sphere)).hit(ray, 0.001, Infinity, rng);

    expectVectorClose(flipped?.normal ?? nowhere, [0, 0, -1]);
    expectVectorClose(twice?.normal ?? nowhere, [0, 0, 1]);
    expect(twice?.t).toBe(sphere.hit(ray, 0.001, Infinity)?.t);
  });

  it('delegates the bounding box', () => {
    let box = new FlipNormals(new Sphere(vec3(0, 0, 0), 2)).boundingBox();
    expectVectorClose(box?.max ?? nowhere, [2, 2, 2]);
  });
});

describe('Group', () => {
  it('returns the closest hit', () => {
    let group = new Group([new Sphere(vec3(0, 0, -10), 1), new Sphere(vec3(0, 0, -5), 1)]);
    let rec = group.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), 0.001, Infinity, rng);
    expect(rec?.t).toBeCloseTo(4, 10);
  });

  it('averages the densities of its members', () => {
    let group = new Group([new XZRect(-1, 1, -1, 1, 2), new XZRect(-1, 1, -1, 1, -2)]);
    expect(group.pdfValue(vec3(0, 0, 0), vec3(0, 1, 0))).toBeCloseTo(0.5, 10);
  });

  it('picks a member uniformly for random directions', () => {
    let group = new Group([new XZRect(-1, 1, -1, 1, 2), new XZRect(-1, 1, -1, 1, -2)]);
    let seeded = createRng('group-random');
    let up = 0;

    for (let i = 0; i < 1000; i++) {
      if (group.random(vec3(0, 0, 0), seeded).y > 0) up++;
    }

    expect(up).toBeGreaterThan(400);
    expect(up).toBeLessThan(600);
  });
});

describe('Entity', () => {
  it('stamps its material index on the hit', () => {
    let entity = new Entity(new Sphere(vec3(0, 0, -5), 1), 3);
    let rec = entity.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), 0.001, Infinity, rng);
    expect(rec?.materialIndex).toBe(3);
  });
});
