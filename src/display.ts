import type { CanvasSize } from './tracer.js';
import { clamp } from './utils/math.js';

// averages the accumulated radiance, applies gamma 2 and quantizes to 8 bits.
// samplesCount is either a single count for every pixel or one count per pixel
export function toneMap(
  radianceData: Float32Array,
  samplesCount: number | Uint32Array,
  canvasSize: CanvasSize
): Uint8ClampedArray {
  let pixelsCount = canvasSize.width * canvasSize.height;
  let pixels = new Uint8ClampedArray(pixelsCount * 3);

  for (let p = 0; p < pixelsCount; p++) {
    let samples = typeof samplesCount === 'number' ? samplesCount : samplesCount[p];
    if (samples === 0) continue;

    for (let c = 0; c < 3; c++) {
      let linear = radianceData[p * 3 + c] / samples;
      pixels[p * 3 + c] = Math.floor(255.99 * clamp(Math.sqrt(linear), 0, 1));
    }
  }

  return pixels;
}

// plain-text PPM, rows top to bottom
export function encodePPM(pixels: Uint8ClampedArray, canvasSize: CanvasSize): string {
  let lines = [`P3`, `${canvasSize.width} ${canvasSize.height}`, `255`];

  for (let p = 0; p < canvasSize.width * canvasSize.height; p++) {
    lines.push(`${pixels[p * 3 + 0]} ${pixels[p * 3 + 1]} ${pixels[p * 3 + 2]}`);
  }

  return lines.join('\n') + '\n';
}
