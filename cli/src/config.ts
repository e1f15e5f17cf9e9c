/**
 * Flyover configuration: defaults, merging and validation.
 *
 * Validation runs before any scoring starts.
 */

import type { FlyoverConfig, ImageInfo } from './types.js';
import { FlyoverError } from './errors.js';

export const DEFAULT_FLYOVER_CONFIG: Readonly<FlyoverConfig> = Object.freeze({
  grid: 10,
  topK: 5,
  framesPerSegment: 60, // 30 FPS -> 2s per segment
  fps: 30,
  zoomMedium: 1.4,
});

const CONFIG_KEYS: readonly (keyof FlyoverConfig)[] = [
  'grid',
  'topK',
  'framesPerSegment',
  'fps',
  'zoomMedium',
];

function isConfigKey(key: string): key is keyof FlyoverConfig {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Collect every problem with a config instead of stopping at the first one.
 */
export function validateConfig(config: FlyoverConfig): string[] {
  const errors: string[] = [];

  for (const key of CONFIG_KEYS) {
    if (!Number.isFinite(config[key])) errors.push(`'${key}' must be a finite number`);
  }
  if (errors.length > 0) return errors;

  if (!Number.isInteger(config.grid) || config.grid < 1) {
    errors.push(`'grid' must be an integer >= 1 (got ${config.grid})`);
  }
  if (!Number.isInteger(config.topK) || config.topK < 0) {
    errors.push(`'topK' must be an integer >= 0 (got ${config.topK})`);
  }
  if (!Number.isInteger(config.framesPerSegment) || config.framesPerSegment < 1) {
    errors.push(`'framesPerSegment' must be an integer >= 1 (got ${config.framesPerSegment})`);
  }
  if (!Number.isInteger(config.fps) || config.fps <= 0) {
    errors.push(`'fps' must be an integer > 0 (got ${config.fps})`);
  }
  if (config.zoomMedium < 1) {
    errors.push(`'zoomMedium' must be >= 1.0 (got ${config.zoomMedium})`);
  }

  return errors;
}

export function assertValidConfig(config: FlyoverConfig): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new FlyoverError(`Invalid configuration: ${errors.join('; ')}`, 'INVALID_CONFIGURATION', {
      errors,
    });
  }
}

export function assertValidImage(image: ImageInfo): void {
  const { width, height } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new FlyoverError(
      `Invalid image dimensions ${width}x${height}: ${image.path}`,
      'INVALID_IMAGE',
      { width, height }
    );
  }
}

/**
 * Cells narrower than a pixel cannot be scored, so the grid may not be finer
 * than the image.
 */
export function assertGridFitsImage(grid: number, image: ImageInfo): void {
  if (grid > image.width || grid > image.height) {
    throw new FlyoverError(
      `Grid ${grid}x${grid} is finer than the ${image.width}x${image.height} image`,
      'INVALID_CONFIGURATION',
      { grid, width: image.width, height: image.height }
    );
  }
}

/**
 * Build a config from an untyped JSON object (e.g. a --config file) layered on
 * top of a base config. Unknown keys and non-numeric values are rejected.
 */
export function parseConfigOverrides(
  raw: unknown,
  base: Readonly<FlyoverConfig> = DEFAULT_FLYOVER_CONFIG
): FlyoverConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new FlyoverError('Config must be a JSON object', 'INVALID_CONFIGURATION');
  }

  const merged: FlyoverConfig = { ...base };
  const errors: string[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      errors.push(`Unknown option '${key}'`);
      continue;
    }
    if (typeof value !== 'number') {
      errors.push(`'${key}' must be a number`);
      continue;
    }
    merged[key] = value;
  }

  if (errors.length > 0) {
    throw new FlyoverError(`Invalid configuration: ${errors.join('; ')}`, 'INVALID_CONFIGURATION', {
      errors,
    });
  }

  return merged;
}

/**
 * Apply CLI flag values; undefined flags leave the base value alone.
 */
export function applyOverrides(
  base: Readonly<FlyoverConfig>,
  overrides: Partial<FlyoverConfig>
): FlyoverConfig {
  const merged: FlyoverConfig = { ...base };
  for (const key of CONFIG_KEYS) {
    const value = overrides[key];
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}
