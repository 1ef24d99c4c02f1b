import type { DesignColor, DesignStyles, SolidPaint } from '../types/design';

const FONT_WEIGHTS: Record<string, number> = {
  light: 300,
  normal: 400,
  medium: 500,
  semibold: 600,
  bold: 700,
};

const FONT_SIZES: Record<string, number> = {
  xs: 12,
  sm: 14,
  base: 16,
  lg: 18,
  xl: 20,
  '2xl': 24,
  '3xl': 30,
  '4xl': 36,
  '5xl': 48,
  '6xl': 60,
};

const FONT_SIZE_RE = /^text-(xs|sm|base|lg|xl|2xl|3xl|4xl|5xl|6xl)$/;
const TEXT_ALIGN_CLASSES = new Set(['text-left', 'text-center', 'text-right', 'text-justify']);

export const TEXT_COLOR_CLASSES: Readonly<Record<string, DesignColor>> = {
  'text-textPrimary': { r: 0.1, g: 0.1, b: 0.1 },
  'text-textSecondary': { r: 0.4, g: 0.4, b: 0.4 },
  'text-primary': { r: 0, g: 0.47, b: 1 },
  'text-warning': { r: 1, g: 0.8, b: 0 },
};

/**
 * Weight, size and alignment classes.
 * Any `font-*` class sets a weight; names outside the scale (font-sans, font-mono) fall back to 400.
 */
export function resolveFontClasses(classes: readonly string[]): DesignStyles {
  const out: DesignStyles = {};
  for (const cls of classes) {
    if (cls.startsWith('font-')) {
      const weight = cls.split('-').pop() || '';
      out.fontWeight = Object.prototype.hasOwnProperty.call(FONT_WEIGHTS, weight) ? FONT_WEIGHTS[weight] : 400;
    }

    const size = FONT_SIZE_RE.exec(cls);
    if (size) out.fontSize = FONT_SIZES[size[1]];

    if (TEXT_ALIGN_CLASSES.has(cls)) {
      out.textAlign = cls.slice('text-'.length).toUpperCase();
    }
  }
  return out;
}

export function textColorFills(classes: readonly string[]): SolidPaint[] {
  const fills: SolidPaint[] = [];
  for (const cls of classes) {
    if (!Object.prototype.hasOwnProperty.call(TEXT_COLOR_CLASSES, cls)) continue;
    fills.push({ type: 'SOLID', color: { ...TEXT_COLOR_CLASSES[cls] } });
  }
  return fills;
}
