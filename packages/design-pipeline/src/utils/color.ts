import type { DesignColor } from '../types/design';

export type NormalizedColor = Required<DesignColor>;

const COLOR_RE =
  /^#([a-fA-F0-9]{3,4}|[a-fA-F0-9]{6}|[a-fA-F0-9]{8})$|^rgb(a?)\((\d+),\s*(\d+),\s*(\d+)(?:,\s*([\d.]+))?\)$/;

function black(): NormalizedColor {
  return { r: 0, g: 0, b: 0, a: 1 };
}

/**
 * Convert a CSS hex or rgb()/rgba() color into 0..1 channels.
 * Anything else (named colors, hsl(), garbage) becomes opaque black.
 */
export function normalizeColor(value: string): NormalizedColor {
  const m = COLOR_RE.exec(value);
  if (!m) return black();
  if (m[1]) return hexToColor(m[1]);
  return rgbStringToColor(value);
}

export function hexToColor(digits: string): NormalizedColor {
  let hex = digits;
  // #rgb / #rgba shorthand: duplicate every digit
  if (hex.length === 3 || hex.length === 4) {
    hex = hex.split('').map(c => c + c).join('');
  }
  const byte = (i: number) => parseInt(hex.slice(i, i + 2), 16) / 255;
  return {
    r: byte(0),
    g: byte(2),
    b: byte(4),
    a: hex.length > 6 ? byte(6) : 1,
  };
}

export function rgbStringToColor(value: string): NormalizedColor {
  const parts = (value.match(/[\d.]+/g) || []).map(Number);
  if (parts.some(n => !Number.isFinite(n))) return black();
  if (parts.length === 3) {
    return { r: parts[0] / 255, g: parts[1] / 255, b: parts[2] / 255, a: 1 };
  }
  if (parts.length === 4) {
    // alpha is already 0..1 in CSS
    return { r: parts[0] / 255, g: parts[1] / 255, b: parts[2] / 255, a: parts[3] };
  }
  return black();
}
