/**
 * Render an SVG artwork through the flattening pipeline.
 *
 * Loads the file, flattens every shape into polygons, replays them on an
 * SvgPenRenderer and writes the result. An output path ending in `.png` is
 * rasterised with sharp; anything else is written as SVG.
 *
 * Usage:
 *   npx tsx scripts/render-artwork.ts [input.svg] [--out file]
 *     [--seg-unit n] [--batch n] [--window WxH] [--no-markers]
 */

import { writeFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { parseArgs } from 'node:util';
import sharp from 'sharp';
import { loadArtworkFile } from '../src/artwork-loader';
import { ARTWORK_CONFIG } from '../src/config';
import { drawArtwork } from '../src/draw-artwork';
import { SvgPenRenderer } from '../src/svg-pen-renderer';
import type { Size } from '../src/types';

void main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

function parsePositive(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`--${flag} expects a positive number, got "${value}".`);
  }
  return parsed;
}

function parseWindow(value: string | undefined): Size {
  if (value === undefined) return ARTWORK_CONFIG.surface;
  const match = /^(\d+)x(\d+)$/i.exec(value.trim());
  if (!match) {
    throw new Error(`--window expects WIDTHxHEIGHT, got "${value}".`);
  }
  return { width: Number(match[1]), height: Number(match[2]) };
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      'seg-unit': { type: 'string' },
      batch: { type: 'string' },
      window: { type: 'string' },
      'no-markers': { type: 'boolean', default: false },
    },
  });

  const inputPath = resolve(positionals[0] ?? ARTWORK_CONFIG.defaultInput);
  const outputPath = resolve(values.out ?? inputPath.replace(/\.svg$/i, '') + '.flattened.svg');

  const segUnit = parsePositive('seg-unit', values['seg-unit'], ARTWORK_CONFIG.segUnit);
  const batchSize = parsePositive('batch', values.batch, ARTWORK_CONFIG.batchSize);
  const surface = parseWindow(values.window);

  console.log(`Loading ${inputPath} (seg unit ${segUnit})...`);
  const artwork = await loadArtworkFile(inputPath, { segUnit, verbose: true });

  const ringCount = artwork.elements.reduce((sum, element) => sum + element.polygon.length, 0);
  const { minX, minY, maxX, maxY } = artwork.extent;
  console.log(`Extent: (${minX}, ${minY}) - (${maxX}, ${maxY}), ${ringCount} ring(s).`);

  const renderer = new SvgPenRenderer();
  const mapping = drawArtwork(renderer, artwork, {
    surface,
    batchSize,
    showMarkers: !values['no-markers'],
  });
  console.log(
    `Drew ${artwork.elements.length} element(s) on a ` +
      `${Math.round(mapping.window.width)}x${Math.round(mapping.window.height)} window ` +
      `in ${renderer.frameCount} frame(s).`
  );

  const svg = renderer.toSvg();
  if (extname(outputPath).toLowerCase() === '.png') {
    await sharp(Buffer.from(svg)).png().toFile(outputPath);
  } else {
    await writeFile(outputPath, svg, 'utf8');
  }

  console.log(`Wrote ${outputPath}`);
}
