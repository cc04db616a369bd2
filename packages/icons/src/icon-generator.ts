/**
 * Placeholder App Icon Generator
 *
 * Renders a square PNG per required size: a solid violet background, an
 * unfilled white circle and a centred "$" glyph scaled to the square.
 * Replace the output with real artwork before shipping.
 */

import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type sharp from 'sharp';
import { DependencyMissingError, createLogger, type Logger } from '@reposnap/core';

export type SharpModule = typeof sharp;
export type SharpLoader = () => Promise<SharpModule>;

export interface IconSpec {
  size: number;
  fileName: string;
}

export const ICON_SIZES: readonly IconSpec[] = [20, 29, 40, 58, 60, 76, 80, 87, 120, 152, 167, 180, 1024]
  .map((size) => ({ size, fileName: `Icon-${size}.png` }));

export const DEFAULT_ICON_DIR = 'Resources/Assets/Assets.xcassets/AppIcon.appiconset';

export const ICON_STYLE = {
  background: 'rgb(139, 92, 246)',
  foreground: '#ffffff',
  glyph: '$',
  fontFamily: 'Arial, Helvetica, sans-serif',
} as const;

export interface GenerateIconsOptions {
  /** Base for a relative outDir; defaults to the current directory */
  workDir?: string;
  outDir?: string;
  sizes?: readonly IconSpec[];
  loader?: SharpLoader;
  logger?: Logger;
}

export interface GeneratedIcon extends IconSpec {
  path: string;
}

export type IconGenerationResult =
  | { status: 'generated'; outDir: string; files: GeneratedIcon[] }
  | { status: 'unavailable'; outDir: string; reason: string };

export async function loadSharp(): Promise<SharpModule> {
  try {
    return (await import('sharp')).default;
  } catch (error) {
    throw new DependencyMissingError(
      'sharp',
      `Install it with: npm install sharp (${error instanceof Error ? error.message : String(error)})`,
    );
  }
}

export function renderIconSvg(size: number): string {
  const margin = Math.floor(size / 8);
  const strokeWidth = Math.max(1, Math.floor(size / 40));
  const center = size / 2;
  // keep the whole stroke inside the margin box
  const radius = (size - 2 * margin - strokeWidth) / 2;
  const fontSize = Math.floor(size / 2);

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}">`,
    `<rect width="${size}" height="${size}" fill="${ICON_STYLE.background}"/>`,
    `<circle cx="${center}" cy="${center}" r="${radius}" fill="none" stroke="${ICON_STYLE.foreground}" stroke-width="${strokeWidth}"/>`,
    `<text x="${center}" y="${center}" fill="${ICON_STYLE.foreground}" font-family="${ICON_STYLE.fontFamily}" font-size="${fontSize}" text-anchor="middle" dominant-baseline="central">${ICON_STYLE.glyph}</text>`,
    '</svg>',
  ].join('');
}

function printGuidance(logger: Logger, outDir: string, sizes: readonly IconSpec[], reason: string): void {
  logger.error(`Image library not available: ${reason}`);
  logger.info('To generate placeholder icons, install it with:');
  logger.info('  npm install sharp');
  logger.info('Alternatively, manually add your icon files to:');
  logger.info(`  ${outDir}`);
  logger.info(`Required sizes: ${sizes.map((s) => s.size).join(', ')} pixels`);
}

/**
 * Writes one placeholder PNG per size. When the image library cannot be
 * loaded, prints guidance and returns `unavailable` instead of throwing.
 */
export async function generateIcons(options: GenerateIconsOptions = {}): Promise<IconGenerationResult> {
  const logger = options.logger ?? createLogger('Icons');
  const sizes = options.sizes ?? ICON_SIZES;
  const outDir = resolve(options.workDir ?? process.cwd(), options.outDir ?? DEFAULT_ICON_DIR);

  let render: SharpModule;
  try {
    render = await (options.loader ?? loadSharp)();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    printGuidance(logger, outDir, sizes, reason);
    return { status: 'unavailable', outDir, reason };
  }

  await mkdir(outDir, { recursive: true });

  const files: GeneratedIcon[] = [];
  for (const spec of sizes) {
    const path = join(outDir, spec.fileName);
    await render(Buffer.from(renderIconSvg(spec.size))).png().toFile(path);
    files.push({ ...spec, path });
    logger.info(`Created: ${path}`);
  }

  logger.info(`Generated ${files.length} placeholder icons in ${outDir}`);
  logger.warn('Remember to replace these with your actual app icon design!');

  return { status: 'generated', outDir, files };
}
