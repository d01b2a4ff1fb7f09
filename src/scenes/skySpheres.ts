import { Camera } from '../camera.js';
import { buildWorld, type SceneObject, type SceneOptions, type TracerScene } from '../scene.js';
import { Dielectric } from '../materials/dielectric.js';
import { Lambertian } from '../materials/lambertian.js';
import { Metal } from '../materials/metal.js';
import { Sphere } from '../primitives/sphere.js';
import { CheckerTexture, NoiseTexture, SolidTexture } from '../textures/texture.js';
import { vec3 } from '../utils/math.js';

// a handful of spheres on a checkered ground, lit by the sky
export function skySpheresScene({ aspect, rng }: SceneOptions): TracerScene {
  let checker = new CheckerTexture(
    new SolidTexture(vec3(0.2, 0.3, 0.1)),
    new SolidTexture(vec3(0.9, 0.9, 0.9))
  );

  let objects: SceneObject[] = [
    { figure: new Sphere(vec3(0, -1000, 0), 1000), material: new Lambertian(checker) },
    { figure: new Sphere(vec3(0, 1, 0), 1), material: new Dielectric(1.5) },
    // a negative radius flips the normals, making the glass sphere hollow
    { figure: new Sphere(vec3(0, 1, 0), -0.9), material: new Dielectric(1.5) },
    { figure: new Sphere(vec3(-4, 1, 0), 1), material: new Lambertian(new NoiseTexture(4, rng)) },
    { figure: new Sphere(vec3(4, 1, 0), 1), material: new Metal(vec3(0.7, 0.6, 0.5), 0.0) },
    { figure: new Sphere(vec3(2, 0.4, 2.5), 0.4), material: new Metal(vec3(0.8, 0.8, 0.8), 0.3) }
  ];

  for (let i = 0; i < 12; i++) {
    let center = vec3(rng.float() * 12 - 6, 0.2, rng.float() * 6 - 1);
    if (center.clone().sub(vec3(0, 0.2, 0)).length() < 1.4) continue;

    objects.push({
      figure: new Sphere(center, 0.2),
      material: new Lambertian(new SolidTexture(vec3(rng.float(), rng.float(), rng.float())))
    });
  }

  let { world, materials } = buildWorld(objects, rng);

  return {
    world,
    materials,
    lightShape: null,
    camera: new Camera({
      lookFrom: vec3(13, 2, 3),
      lookAt: vec3(0, 0, 0),
      vfov: 20,
      aspect,
      aperture: 0.1,
      focusDistance: 10
    }),
    background: { type: 'sky' }
  };
}
