/**
 * Basic usage example for rasterkit
 *
 * Builds a small two-frame animation, runs it through a few processors and
 * writes the result as GIF, PNG and JPEG.
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import {
  Image,
  ImageFrame,
  PixelBuffer,
  loadImage,
  parseHexColor,
  processImage,
  saveImage
} from '../src/index.js';

/**
 * Helper function to create a frame with a diagonal two-color split
 */
function createSplitFrame(width: number, height: number, first: string, second: string): PixelBuffer {
  const buffer = new PixelBuffer(width, height);
  const a = parseHexColor(first);
  const b = parseHexColor(second);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      buffer.setPixel(x, y, x > y ? a : b);
    }
  }
  return buffer;
}

async function main() {
  const outDir = join(process.cwd(), 'example-output');
  mkdirSync(outDir, { recursive: true });

  console.log('Creating a 64x64 animation...');
  const image = new Image(createSplitFrame(64, 64, '#ff0000', '#0000ff'));
  image.frameDelay = 200;
  image.addFrame(new ImageFrame(createSplitFrame(64, 64, '#00ff00', '#ffff00'), 200));
  image.setProperty('Comments', 'rasterkit basic usage');

  await processImage(image, 'gaussianBlur', { sigma: 1.5 });
  await processImage(image, 'resize', { width: 32, sampler: 'lanczos3' }, {
    onRowsProcessed: (done, total) => {
      if (done === total) console.log(`Resized ${total} rows`);
    }
  });

  const gifPath = join(outDir, 'animation.gif');
  await saveImage(image, gifPath);
  await saveImage(image, join(outDir, 'first-frame.png'));
  await saveImage(image, join(outDir, 'first-frame.jpg'), 'jpeg', { quality: 90 });

  const reloaded = await loadImage(gifPath);
  console.log(
    `Reloaded ${reloaded.width}x${reloaded.height}, ${reloaded.frames.length + 1} frames, ` +
      `comment: ${reloaded.getProperty('Comments') ?? '(none)'}`
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
