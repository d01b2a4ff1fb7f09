import { Vector3 } from 'three';
import { Camera } from '../camera.js';
import { buildWorld, type SceneObject, type SceneOptions, type TracerScene } from '../scene.js';
import { DiffuseLight } from '../materials/diffuseLight.js';
import { Isotropic } from '../materials/isotropic.js';
import { Lambertian } from '../materials/lambertian.js';
import { ConstantMedium } from '../primitives/constantMedium.js';
import { Cuboid } from '../primitives/cuboid.js';
import { FlipNormals } from '../primitives/flipNormals.js';
import { XYRect, XZRect, YZRect } from '../primitives/rect.js';
import { RotateY } from '../primitives/rotateY.js';
import { Translate } from '../primitives/translate.js';
import { SolidTexture } from '../textures/texture.js';
import { vec3 } from '../utils/math.js';

export function cornellSmokeScene({ aspect, rng }: SceneOptions): TracerScene {
  let red = new Lambertian(new SolidTexture(vec3(0.65, 0.05, 0.05)));
  let white = new Lambertian(new SolidTexture(vec3(0.73, 0.73, 0.73)));
  let green = new Lambertian(new SolidTexture(vec3(0.12, 0.45, 0.15)));
  let light = new DiffuseLight(new SolidTexture(vec3(7, 7, 7)));

  let shortBox = new Translate(vec3(130, 0, 65), new RotateY(-18, new Cuboid(vec3(0, 0, 0), vec3(165, 165, 165))));
  let tallBox = new Translate(vec3(265, 0, 295), new RotateY(15, new Cuboid(vec3(0, 0, 0), vec3(165, 330, 165))));

  let objects: SceneObject[] = [
    { figure: new FlipNormals(new YZRect(0, 555, 0, 555, 555)), material: green },
    { figure: new YZRect(0, 555, 0, 555, 0), material: red },
    { figure: new FlipNormals(new XZRect(113, 443, 127, 432, 554)), material: light },
    { figure: new FlipNormals(new XZRect(0, 555, 0, 555, 555)), material: white },
    { figure: new XZRect(0, 555, 0, 555, 0), material: white },
    { figure: new FlipNormals(new XYRect(0, 555, 0, 555, 555)), material: white },
    { figure: new ConstantMedium(0.01, shortBox), material: new Isotropic(new SolidTexture(vec3(1, 1, 1))) },
    { figure: new ConstantMedium(0.01, tallBox), material: new Isotropic(new SolidTexture(vec3(0, 0, 0))) }
  ];

  let { world, materials } = buildWorld(objects, rng);

  return {
    world,
    materials,
    lightShape: new XZRect(113, 443, 127, 432, 554),
    camera: new Camera({
      lookFrom: vec3(278, 278, -800),
      lookAt: vec3(278, 278, 0),
      vfov: 40,
      aspect
    }),
    background: { type: 'solid', color: new Vector3(0, 0, 0) }
  };
}
