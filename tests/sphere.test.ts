import { describe, it, expect } from 'vitest';
import { Ray } from '../src/geometry/ray.js';
import { Sphere } from '../src/primitives/sphere.js';
import { createRng } from '../src/samplers/uniform.js';
import { randomInUnitSphere, vec3 } from '../src/utils/math.js';
import { expectVectorClose } from './helpers.js';

describe('Sphere', () => {
  it('hits at distance d - r along a unit ray', () => {
    let sphere = new Sphere(vec3(0, 0, -5), 1);
    let rec = sphere.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), 0.001, Infinity);

    expect(rec).not.toBeNull();
    expect(rec?.t).toBeCloseTo(4, 10);
    expectVectorClose(rec?.point ?? vec3(NaN, NaN, NaN), [0, 0, -4]);
    expectVectorClose(rec?.normal ?? vec3(NaN, NaN, NaN), [0, 0, 1]);
    expect(rec?.u).toBe(1);
    expect(rec?.v).toBe(1);
  });

  it('measures t in units of the ray direction', () => {
    let sphere = new Sphere(vec3(0, 0, -5), 1);
    let rec = sphere.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -2)), 0.001, Infinity);

    expect(rec?.t).toBeCloseTo(2, 10);
    expectVectorClose(rec?.point ?? vec3(NaN, NaN, NaN), [0, 0, -4]);
  });

  it('falls back to the far root from inside', () => {
    let sphere = new Sphere(vec3(0, 0, -5), 1);
    let rec = sphere.hit(new Ray(vec3(0, 0, -5), vec3(1, 0, 0)), 0.001, Infinity);

    expect(rec?.t).toBeCloseTo(1, 10);
    expectVectorClose(rec?.normal ?? vec3(NaN, NaN, NaN), [1, 0, 0]);
  });

  it('treats tangent rays as misses', () => {
    let sphere = new Sphere(vec3(0, 0, -5), 1);
    expect(sphere.hit(new Ray(vec3(0, 1, 0), vec3(0, 0, -1)), 0.001, Infinity)).toBeNull();
  });

  it('rejects roots outside the open interval', () => {
    let sphere = new Sphere(vec3(0, 0, -5), 1);
    let ray = new Ray(vec3(0, 0, 0), vec3(0, 0, -1));
    expect(sphere.hit(ray, 0.001, 4)).toBeNull();
    expect(sphere.hit(ray, 6, Infinity)).toBeNull();
  });

  it('normals are unit length and parallel to point - center', () => {
    let rng = createRng('sphere-normals');
    let center = vec3(1, 2, 3);
    let sphere = new Sphere(center, 2.5);

    for (let i = 0; i < 50; i++) {
      let origin = vec3(20, 0, 0);
      let target = center.clone().add(randomInUnitSphere(rng).multiplyScalar(2));
      let rec = sphere.hit(new Ray(origin, target.sub(origin)), 0.001, Infinity);
      if (!rec) throw new Error('ray aimed inside the sphere missed it');

      expect(rec.normal.length()).toBeCloseTo(1, 10);
      let radial = rec.point.clone().sub(center).normalize();
      expect(radial.dot(rec.normal)).toBeCloseTo(1, 10);
    }
  });

  it('bounding box uses the absolute radius', () => {
    let box = new Sphere(vec3(1, 1, 1), -0.5).boundingBox();
    expectVectorClose(box.min, [0.5, 0.5, 0.5]);
    expectVectorClose(box.max, [1.5, 1.5, 1.5]);
  });

  it('pdfValue is the inverse of the subtended solid angle', () => {
    let sphere = new Sphere(vec3(0, 0, -5), 1);
    let origin = vec3(0, 0, 0);
    let expected = 1 / (2 * Math.PI * (1 - Math.sqrt(1 - 1 / 25)));

    expect(sphere.pdfValue(origin, vec3(0, 0, -1))).toBeCloseTo(expected, 8);
    expect(sphere.pdfValue(origin, vec3(1, 0, 0))).toBe(0);
  });

  it('random directions point at the sphere', () => {
    let rng = createRng('sphere-random');
    let sphere = new Sphere(vec3(3, -2, 7), 1.5);
    let origin = vec3(0, 1, 0);

    for (let i = 0; i < 100; i++) {
      let direction = sphere.random(origin, rng);
      expect(sphere.hit(new Ray(origin, direction), 0.001, Infinity)).not.toBeNull();
    }
  });
});
