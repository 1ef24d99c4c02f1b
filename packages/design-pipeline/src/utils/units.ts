const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const INTEGER_RE = /^[+-]?\d+$/;

// Both helpers throw on bad input; callers decide whether that is fatal.

/** '14px' | '14' | '14.7' => 14. Other units are rejected. */
export function parsePixels(raw: string): number {
  const trimmed = raw.replace(/px/g, '').trim();
  if (!DECIMAL_RE.test(trimmed)) {
    throw new Error(`invalid pixel value: ${JSON.stringify(raw)}`);
  }
  const n = Math.trunc(Number(trimmed));
  if (!Number.isFinite(n)) {
    throw new Error(`pixel value out of range: ${JSON.stringify(raw)}`);
  }
  return n;
}

export function parseInteger(raw: string): number {
  const trimmed = raw.trim();
  if (!INTEGER_RE.test(trimmed)) {
    throw new Error(`invalid integer: ${JSON.stringify(raw)}`);
  }
  return parseInt(trimmed, 10);
}

export function tryParseInteger(raw: string | undefined): number | null {
  if (raw == null) return null;
  try {
    return parseInteger(raw);
  } catch {
    return null;
  }
}
