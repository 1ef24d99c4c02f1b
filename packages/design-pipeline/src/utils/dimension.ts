import type { Dimension, DesignStyles, Framework } from '../types/design';
import { imageHashFor } from './hash';
import { tryParseInteger } from './units';

type Axis = 'width' | 'height';

// Keyword classes shared by Tailwind (w-full, w-screen) and Bootstrap (w-100)
const KEYWORD_DIMENSIONS: Record<string, [Axis, string]> = {
  'w-full': ['width', '100%'],
  'w-screen': ['width', '100vw'],
  'h-full': ['height', '100%'],
  'h-screen': ['height', '100vh'],
  'w-100': ['width', '100%'],
  'h-100': ['height', '100%'],
};

// Sizes an <img> gets straight from its classes, before any framework table runs
const IMAGE_PRESETS: Record<string, [Axis, Dimension]> = {
  'w-full': ['width', '100%'],
  'h-40': ['height', 160],
  'w-24': ['width', 96],
  'h-24': ['height', 96],
};

const GENERIC_DIMENSION_RE = /^([wh])-(\d+)$/;

function axisOf(cls: string): Axis | null {
  if (cls.startsWith('w-')) return 'width';
  if (cls.startsWith('h-')) return 'height';
  return null;
}

/**
 * Numeric and keyword width/height classes of an <img>.
 * Tailwind (and undetected) documents count 4px per unit; Bootstrap reads the number as a percentage.
 */
export function applyImageDimensions(classes: readonly string[], framework: Framework, styles: DesignStyles): void {
  for (const cls of classes) {
    const axis = axisOf(cls);
    if (!axis) continue;
    const n = tryParseInteger(cls.split('-')[1]);
    // w-auto, w-1/2 and friends
    if (n === null) continue;
    styles[axis] = framework === 'bootstrap' ? `${n}%` : n * 4;
  }
  for (const cls of classes) {
    if (!Object.prototype.hasOwnProperty.call(KEYWORD_DIMENSIONS, cls)) continue;
    const [axis, value] = KEYWORD_DIMENSIONS[cls];
    styles[axis] = value;
  }
}

/**
 * w-<n> / h-<n> on any element, always 4px per unit.
 * Runs after the framework table, so a Bootstrap `w-25` ends up as 100px rather than '25%'.
 */
export function applyDimensionClasses(classes: readonly string[], styles: DesignStyles): void {
  for (const cls of classes) {
    const m = GENERIC_DIMENSION_RE.exec(cls);
    if (!m) continue;
    const axis: Axis = m[1] === 'w' ? 'width' : 'height';
    styles[axis] = parseInt(m[2], 10) * 4;
  }
}

export function applyImageLayout(classes: readonly string[], src: string | undefined, styles: DesignStyles): void {
  if (src !== undefined) {
    styles.imageHash = imageHashFor(src);
  }
  for (const cls of classes) {
    if (!Object.prototype.hasOwnProperty.call(IMAGE_PRESETS, cls)) continue;
    const [axis, value] = IMAGE_PRESETS[cls];
    styles[axis] = value;
  }
  styles.constraints = { horizontal: 'SCALE', vertical: 'SCALE' };
  styles.layoutMode = 'NONE';
}
