import type { CanvasSize } from './tracer.js';

export type Tile = {
  x: number;
  y: number;
  w: number;
  h: number;
};

// splits the canvas in square tiles (the last row / column may be smaller),
// and hands them out one pass after the other
export class TileSequence {
  private tiles: Tile[] = [];
  private next = 0;

  constructor(
    private canvasSize: CanvasSize,
    private tileSize: number
  ) {
    if (!(tileSize >= 1)) {
      throw new Error(`tileSize must be a positive integer, got ${tileSize}`);
    }

    for (let y = 0; y < canvasSize.height; y += tileSize) {
      for (let x = 0; x < canvasSize.width; x += tileSize) {
        this.tiles.push({
          x,
          y,
          w: Math.min(tileSize, canvasSize.width - x),
          h: Math.min(tileSize, canvasSize.height - y)
        });
      }
    }
  }

  get tilesCount(): number {
    return this.tiles.length;
  }

  getNextTile(): Tile {
    let tile = this.tiles[this.next % this.tiles.length];
    this.next++;
    return { ...tile };
  }

  getTiles(): Tile[] {
    return this.tiles.map((tile) => ({ ...tile }));
  }
}

export class TileManager {
  // tileData holds the sum of `samples` samples per pixel, as returned by renderTile
  static addSample(
    radianceData: Float32Array,
    sampleCounts: Uint32Array,
    canvasSize: CanvasSize,
    tile: Tile,
    tileData: Float32Array,
    samples: number
  ): void {
    for (let j = 0; j < tile.h; j++) {
      for (let i = 0; i < tile.w; i++) {
        let x = tile.x + i;
        let y = tile.y + j;

        let index = (canvasSize.width * y + x) * 3;
        let tileIndex = (tile.w * j + i) * 3;

        radianceData[index + 0] += tileData[tileIndex + 0];
        radianceData[index + 1] += tileData[tileIndex + 1];
        radianceData[index + 2] += tileData[tileIndex + 2];
        sampleCounts[canvasSize.width * y + x] += samples;
      }
    }
  }
}
