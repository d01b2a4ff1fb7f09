import { Camera } from '../camera.js';
import { buildWorld, type SceneOptions, type TracerScene } from '../scene.js';
import { Lambertian } from '../materials/lambertian.js';
import { Sphere } from '../primitives/sphere.js';
import { SolidTexture } from '../textures/texture.js';
import { vec3 } from '../utils/math.js';

export function singleSphereScene({ aspect, rng }: SceneOptions): TracerScene {
  let { world, materials } = buildWorld(
    [{ figure: new Sphere(vec3(0, 0, -1), 0.5), material: new Lambertian(new SolidTexture(vec3(0.5, 0.5, 0.5))) }],
    rng
  );

  return {
    world,
    materials,
    lightShape: null,
    camera: new Camera({
      lookFrom: vec3(0, 0, 0),
      lookAt: vec3(0, 0, -1),
      vfov: 90,
      aspect
    }),
    background: { type: 'sky' }
  };
}
