import { describe, it, expect } from 'vitest';
import { AABB } from '../src/geometry/aabb.js';
import { Ray } from '../src/geometry/ray.js';
import { vec3 } from '../src/utils/math.js';
import { expectVectorClose } from './helpers.js';

describe('AABB', () => {
  const unitBox = () => new AABB(vec3(0, 0, 0), vec3(1, 1, 1));

  it('surround is the smallest box containing both', () => {
    let a = unitBox();
    let b = new AABB(vec3(-1, 2, 0.5), vec3(0.5, 3, 4));
    let s = a.surround(b);

    expectVectorClose(s.min, [-1, 0, 0]);
    expectVectorClose(s.max, [1, 3, 4]);
    expect(s.contains(a)).toBe(true);
    expect(s.contains(b)).toBe(true);
    // the inputs are left alone
    expectVectorClose(a.max, [1, 1, 1]);
  });

  it('expand grows the box around points and boxes', () => {
    let box = new AABB();
    box.expand(vec3(1, -2, 3));
    box.expand(vec3(-1, 0, 0));
    box.expand(new AABB(vec3(0, 0, 0), vec3(0, 5, 0)));

    expectVectorClose(box.min, [-1, -2, 0]);
    expectVectorClose(box.max, [1, 5, 3]);
  });

  it('hits with zero direction components', () => {
    let ray = new Ray(vec3(0.5, 0.5, -5), vec3(0, 0, 1));
    expect(unitBox().hit(ray, 0.001, Infinity)).toBe(true);
  });

  it('misses when a zero direction component starts outside the slab', () => {
    let ray = new Ray(vec3(2, 0.5, -5), vec3(0, 0, 1));
    expect(unitBox().hit(ray, 0.001, Infinity)).toBe(false);
  });

  it('misses when the box lies beyond tmax', () => {
    let ray = new Ray(vec3(0.5, 0.5, -5), vec3(0, 0, 1));
    expect(unitBox().hit(ray, 0.001, 4)).toBe(false);
    expect(unitBox().hit(ray, 0.001, 5.5)).toBe(true);
  });

  it('hits with negative direction components', () => {
    let ray = new Ray(vec3(3, 3, 3), vec3(-1, -1, -1));
    expect(unitBox().hit(ray, 0.001, Infinity)).toBe(true);
    expect(unitBox().hit(new Ray(vec3(3, 3, 3), vec3(1, 1, 1)), 0.001, Infinity)).toBe(false);
  });

  it('translate shifts both corners', () => {
    let moved = unitBox().translate(vec3(10, -1, 0));
    expectVectorClose(moved.min, [10, -1, 0]);
    expectVectorClose(moved.max, [11, 0, 1]);
  });
});
