import { Vector3 } from 'three';
import { Camera } from '../camera.js';
import { buildWorld, type SceneObject, type SceneOptions, type TracerScene } from '../scene.js';
import { Dielectric } from '../materials/dielectric.js';
import { DiffuseLight } from '../materials/diffuseLight.js';
import { Lambertian } from '../materials/lambertian.js';
import { Cuboid } from '../primitives/cuboid.js';
import { FlipNormals } from '../primitives/flipNormals.js';
import { Group } from '../primitives/group.js';
import { XYRect, XZRect, YZRect } from '../primitives/rect.js';
import { RotateY } from '../primitives/rotateY.js';
import { Sphere } from '../primitives/sphere.js';
import { Translate } from '../primitives/translate.js';
import { SolidTexture } from '../textures/texture.js';
import { vec3 } from '../utils/math.js';

export function cornellBoxScene({ aspect, rng }: SceneOptions): TracerScene {
  let red = new Lambertian(new SolidTexture(vec3(0.65, 0.05, 0.05)));
  let white = new Lambertian(new SolidTexture(vec3(0.73, 0.73, 0.73)));
  let green = new Lambertian(new SolidTexture(vec3(0.12, 0.45, 0.15)));
  let light = new DiffuseLight(new SolidTexture(vec3(15, 15, 15)));
  let glass = new Dielectric(1.5);

  let lightRect = new XZRect(213, 343, 227, 332, 554);
  let glassSphere = new Sphere(vec3(190, 90, 190), 90);

  let objects: SceneObject[] = [
    { figure: new FlipNormals(new YZRect(0, 555, 0, 555, 555)), material: green },
    { figure: new YZRect(0, 555, 0, 555, 0), material: red },
    // the light faces down, into the box
    { figure: new FlipNormals(lightRect), material: light },
    { figure: new FlipNormals(new XZRect(0, 555, 0, 555, 555)), material: white },
    { figure: new XZRect(0, 555, 0, 555, 0), material: white },
    { figure: new FlipNormals(new XYRect(0, 555, 0, 555, 555)), material: white },
    { figure: glassSphere, material: glass },
    {
      figure: new Translate(
        vec3(265, 0, 295),
        new RotateY(15, new Cuboid(vec3(0, 0, 0), vec3(165, 330, 165)))
      ),
      material: white
    }
  ];

  let { world, materials } = buildWorld(objects, rng);

  return {
    world,
    materials,
    // the glass sphere is sampled too, so caustics converge faster
    lightShape: new Group([lightRect, glassSphere]),
    camera: new Camera({
      lookFrom: vec3(278, 278, -800),
      lookAt: vec3(278, 278, 0),
      vfov: 40,
      aspect,
      aperture: 0,
      focusDistance: 10
    }),
    background: { type: 'solid', color: new Vector3(0, 0, 0) }
  };
}
