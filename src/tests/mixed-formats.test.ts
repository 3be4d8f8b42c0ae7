/**
 * Mixed Format Tests
 *
 * The same picture stored in every lossless container must decode to the
 * same pixels; the JPEG copy must stay close to them.
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';
import { Image } from '../image.js';
import { Vexel } from '../vexel.js';
import {
  createGradientRgba,
  createPngjsImage,
  createTestBmp,
  createTestJpeg,
  createTga
} from '../test-utils/image-fixtures.js';
import { buildGif } from '../test-utils/gif-builder.js';
import { encodeBmp, encodePam, encodePpm } from '../writer.js';

const WIDTH = 12;
const HEIGHT = 7;

function dropAlpha(rgba: Uint8Array): Uint8Array {
  const rgb = new Uint8Array((rgba.length / 4) * 3);
  for (let i = 0, j = 0; i < rgba.length; i += 4, j += 3) {
    rgb[j] = rgba[i];
    rgb[j + 1] = rgba[i + 1];
    rgb[j + 2] = rgba[i + 2];
  }
  return rgb;
}

function swapRedBlue(rgb: Uint8Array): Uint8Array {
  const bgr = new Uint8Array(rgb.length);
  for (let i = 0; i < rgb.length; i += 3) {
    bgr[i] = rgb[i + 2];
    bgr[i + 1] = rgb[i + 1];
    bgr[i + 2] = rgb[i];
  }
  return bgr;
}

async function decodeRgb(bytes: Uint8Array): Promise<{ format: string; rgb: Uint8Array }> {
  const vexel = await Vexel.open(bytes);
  const image = await vexel.decode();
  assert.strictEqual(image.width, WIDTH);
  assert.strictEqual(image.height, HEIGHT);
  return { format: vexel.format, rgb: image.asRgb8() };
}

describe('Mixed Formats', () => {
  const rgba = createGradientRgba(WIDTH, HEIGHT);
  const rgb = dropAlpha(rgba);
  const reference = new Image(WIDTH, HEIGHT, { format: 'rgb8', data: rgb });

  test('lossless containers agree pixel for pixel', async () => {
    const files = [
      createPngjsImage(WIDTH, HEIGHT, rgba),
      createTestBmp(WIDTH, HEIGHT, rgb),
      createTestBmp(WIDTH, HEIGHT, rgb, { bitsPerPixel: 32, topDown: true }),
      encodeBmp(reference),
      encodePpm(reference),
      encodePam(reference),
      createTga({ imageType: 2, width: WIDTH, height: HEIGHT, pixelDepth: 24, descriptor: 0x20, data: swapRedBlue(rgb) })
    ];

    const decoded = await Promise.all(files.map(decodeRgb));
    assert.deepStrictEqual(
      decoded.map((entry) => entry.format),
      ['png', 'bmp', 'bmp', 'bmp', 'netpbm', 'netpbm', 'tga']
    );
    for (const entry of decoded) {
      assert.deepStrictEqual(entry.rgb, rgb, `${entry.format} pixels differ`);
    }
  });

  test('a GIF with the exact palette decodes to the same pixels', async () => {
    const palette: [number, number, number][] = [];
    const indices: number[] = [];
    for (let i = 0; i < rgb.length; i += 3) {
      let index = palette.findIndex(([r, g, b]) => r === rgb[i] && g === rgb[i + 1] && b === rgb[i + 2]);
      if (index < 0) {
        index = palette.push([rgb[i], rgb[i + 1], rgb[i + 2]]) - 1;
      }
      indices.push(index);
    }

    const gif = buildGif({
      width: WIDTH,
      height: HEIGHT,
      globalPalette: palette,
      frames: [{ width: WIDTH, height: HEIGHT, indices }]
    });
    const { format, rgb: decoded } = await decodeRgb(gif);
    assert.strictEqual(format, 'gif');
    assert.deepStrictEqual(decoded, rgb);
  });

  test('a high quality JPEG stays close to the source', async () => {
    const jpeg = await createTestJpeg(WIDTH, HEIGHT, rgba, 100);
    const { format, rgb: decoded } = await decodeRgb(jpeg);
    assert.strictEqual(format, 'jpeg');

    let worst = 0;
    for (let i = 0; i < rgb.length; i++) {
      worst = Math.max(worst, Math.abs(decoded[i] - rgb[i]));
    }
    assert.ok(worst <= 24, `largest channel error ${worst}`);
  });
});
