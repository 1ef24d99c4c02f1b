import type { DesignStyles, WarnSink } from '../types/design';
import { normalizeColor } from '../utils/color';
import { parseInteger, parsePixels } from '../utils/units';

type Apply = (value: string, styles: DesignStyles) => void;

const FONT_PROPS: Array<[cssProp: string, apply: Apply]> = [
  ['font-size', (v, s) => { s.fontSize = parsePixels(v); }],
  ['font-weight', (v, s) => { s.fontWeight = parseInteger(v); }],
  ['text-align', (v, s) => { s.textAlign = v.toUpperCase(); }],
  ['line-height', (v, s) => { s.lineHeight = { unit: 'PIXELS', value: parsePixels(v) }; }],
];

/** A value that fails to convert is reported and skipped; the other properties still apply. */
export function applyInlineFontStyles(decls: Record<string, string>, styles: DesignStyles, warn: WarnSink): void {
  for (const [prop, apply] of FONT_PROPS) {
    if (!Object.prototype.hasOwnProperty.call(decls, prop)) continue;
    try {
      apply(decls[prop], styles);
    } catch (e) {
      warn(`failed to convert ${prop}`, { value: decls[prop], error: e instanceof Error ? e.message : String(e) });
    }
  }
}

export function applyInlineColorStyles(decls: Record<string, string>, styles: DesignStyles): void {
  if (Object.prototype.hasOwnProperty.call(decls, 'color')) {
    styles.fills = [...(styles.fills || []), { type: 'SOLID', color: normalizeColor(decls.color) }];
  }
  if (Object.prototype.hasOwnProperty.call(decls, 'background-color')) {
    styles.background = [
      ...(styles.background || []),
      { type: 'SOLID', color: normalizeColor(decls['background-color']) },
    ];
  }
}

export function applyInlineStyles(decls: Record<string, string>, styles: DesignStyles, warn: WarnSink): void {
  applyInlineFontStyles(decls, styles, warn);
  applyInlineColorStyles(decls, styles);
}
