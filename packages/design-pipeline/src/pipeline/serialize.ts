import type {
  AxisAlign,
  ConstraintType,
  DesignColor,
  DesignNode,
  DesignNodeJson,
  DesignStyles,
  DropShadowEffect,
  LayoutMode,
  LineHeight,
  Positioning,
  SolidPaint,
} from '../types/design';

export function toDesignJson(node: DesignNode): DesignNodeJson {
  return {
    tag: node.tag,
    classes: [...node.classes],
    text: node.text,
    attributes: { ...node.attributes },
    figma_styles: structuredClone(node.designStyles),
    children: node.children.map(toDesignJson),
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function fail(path: string, expected: string): never {
  throw new Error(`design json: ${path} must be ${expected}`);
}

function readStringRecord(v: unknown, path: string): Record<string, string> {
  if (!isRecord(v)) fail(path, 'an object');
  const out: Record<string, string> = {};
  for (const [k, val] of Object.entries(v)) {
    if (typeof val !== 'string') fail(`${path}.${k}`, 'a string');
    out[k] = val;
  }
  return out;
}

const NUMBER_KEYS = [
  'itemSpacing', 'paddingTop', 'paddingRight', 'paddingBottom', 'paddingLeft',
  'marginTop', 'marginRight', 'marginBottom', 'marginLeft',
  'fontSize', 'fontWeight', 'strokeWeight', 'cornerRadius', 'x', 'y',
] as const;
const DIMENSION_KEYS = ['width', 'height', 'minWidth', 'maxWidth'] as const;
const STRING_KEYS = ['textAlign', 'imageHash'] as const;
const PAINT_KEYS = ['fills', 'background', 'strokes'] as const;

const LAYOUT_MODES: readonly LayoutMode[] = ['NONE', 'HORIZONTAL', 'VERTICAL'];
const AXIS_ALIGNS: readonly AxisAlign[] = ['MIN', 'CENTER', 'MAX'];
const CONSTRAINTS: readonly ConstraintType[] = ['MIN', 'MAX', 'CENTER', 'STRETCH', 'SCALE'];
const POSITIONINGS: readonly Positioning[] = ['AUTO', 'ABSOLUTE'];

function oneOf<T extends string>(v: unknown, allowed: readonly T[], path: string): T {
  const hit = allowed.find(a => a === v);
  if (hit === undefined) fail(path, `one of ${allowed.join(', ')}`);
  return hit;
}

function readNumber(v: unknown, path: string): number {
  if (typeof v !== 'number' || !Number.isFinite(v)) fail(path, 'a number');
  return v;
}

function readColor(v: unknown, path: string): DesignColor {
  if (!isRecord(v)) fail(path, 'an object');
  const color: DesignColor = {
    r: readNumber(v.r, `${path}.r`),
    g: readNumber(v.g, `${path}.g`),
    b: readNumber(v.b, `${path}.b`),
  };
  if (v.a !== undefined) color.a = readNumber(v.a, `${path}.a`);
  return color;
}

function readPaints(v: unknown, path: string): SolidPaint[] {
  if (!Array.isArray(v)) fail(path, 'an array');
  return v.map((p: unknown, i): SolidPaint => {
    const at = `${path}[${i}]`;
    if (!isRecord(p) || p.type !== 'SOLID') fail(at, 'a SOLID paint');
    const paint: SolidPaint = { type: 'SOLID', color: readColor(p.color, `${at}.color`) };
    if (p.opacity !== undefined) paint.opacity = readNumber(p.opacity, `${at}.opacity`);
    return paint;
  });
}

function readEffects(v: unknown, path: string): DropShadowEffect[] {
  if (!Array.isArray(v)) fail(path, 'an array');
  return v.map((e: unknown, i): DropShadowEffect => {
    const at = `${path}[${i}]`;
    if (!isRecord(e) || e.type !== 'DROP_SHADOW') fail(at, 'a DROP_SHADOW effect');
    if (!isRecord(e.offset)) fail(`${at}.offset`, 'an object');
    return {
      type: 'DROP_SHADOW',
      color: readColor(e.color, `${at}.color`),
      offset: { x: readNumber(e.offset.x, `${at}.offset.x`), y: readNumber(e.offset.y, `${at}.offset.y`) },
      radius: readNumber(e.radius, `${at}.radius`),
    };
  });
}

function readLineHeight(v: unknown, path: string): number | LineHeight {
  if (typeof v === 'number') return v;
  if (!isRecord(v) || v.unit !== 'PIXELS') fail(path, 'a number or a PIXELS line height');
  return { unit: 'PIXELS', value: readNumber(v.value, `${path}.value`) };
}

function readStyles(raw: unknown, path: string): DesignStyles {
  if (!isRecord(raw)) fail(path, 'an object');
  const v = raw;
  const out: DesignStyles = {};
  const has = (k: string) => v[k] !== undefined;
  for (const k of NUMBER_KEYS) if (has(k)) out[k] = readNumber(v[k], `${path}.${k}`);
  for (const k of DIMENSION_KEYS) {
    if (!has(k)) continue;
    const d = v[k];
    out[k] = typeof d === 'string' ? d : readNumber(d, `${path}.${k}`);
  }
  for (const k of STRING_KEYS) {
    if (!has(k)) continue;
    const s = v[k];
    if (typeof s !== 'string') fail(`${path}.${k}`, 'a string');
    out[k] = s;
  }
  for (const k of PAINT_KEYS) if (has(k)) out[k] = readPaints(v[k], `${path}.${k}`);
  if (has('layoutMode')) out.layoutMode = oneOf(v.layoutMode, LAYOUT_MODES, `${path}.layoutMode`);
  if (has('primaryAxisAlignItems')) {
    out.primaryAxisAlignItems = oneOf(v.primaryAxisAlignItems, AXIS_ALIGNS, `${path}.primaryAxisAlignItems`);
  }
  if (has('counterAxisAlignItems')) {
    out.counterAxisAlignItems = oneOf(v.counterAxisAlignItems, AXIS_ALIGNS, `${path}.counterAxisAlignItems`);
  }
  if (has('constraints')) {
    const c = v.constraints;
    if (!isRecord(c)) fail(`${path}.constraints`, 'an object');
    out.constraints = {
      horizontal: oneOf(c.horizontal, CONSTRAINTS, `${path}.constraints.horizontal`),
      vertical: oneOf(c.vertical, CONSTRAINTS, `${path}.constraints.vertical`),
    };
  }
  if (has('lineHeight')) out.lineHeight = readLineHeight(v.lineHeight, `${path}.lineHeight`);
  if (has('effects')) out.effects = readEffects(v.effects, `${path}.effects`);
  if (has('positioning')) out.positioning = oneOf(v.positioning, POSITIONINGS, `${path}.positioning`);
  return out;
}

function readNode(v: unknown, path: string): DesignNodeJson {
  if (!isRecord(v)) fail(path, 'an object');
  const { tag, classes, text, attributes, figma_styles, children } = v;
  if (typeof tag !== 'string' || !tag) fail(`${path}.tag`, 'a non-empty string');
  if (!Array.isArray(classes) || !classes.every((c): c is string => typeof c === 'string')) {
    fail(`${path}.classes`, 'an array of strings');
  }
  if (text !== null && typeof text !== 'string') fail(`${path}.text`, 'a string or null');
  if (!Array.isArray(children)) fail(`${path}.children`, 'an array');
  return {
    tag,
    classes,
    text,
    attributes: readStringRecord(attributes, `${path}.attributes`),
    figma_styles: readStyles(figma_styles, `${path}.figma_styles`),
    children: children.map((child, i) => readNode(child, `${path}.children[${i}]`)),
  };
}

/** Validate a value read back from JSON (file or HTTP body) into the node wire shape. */
export function parseDesignJson(value: unknown): DesignNodeJson {
  return readNode(value, '$');
}

function fmt(v: unknown): string {
  return JSON.stringify(v);
}

/** Indented text dump of a tree, one block per node. */
export function formatDesignTree(node: DesignNode, indent = 0): string {
  const pad = ' '.repeat(indent);
  const lines = [
    `${pad}Tag: ${node.tag}`,
    `${pad}Classes: ${fmt(node.classes)}`,
    `${pad}Framework: ${node.framework}`,
    `${pad}Attributes: ${fmt(node.attributes)}`,
    `${pad}Styles: ${fmt(node.styles)}`,
    `${pad}Figma Styles: ${fmt(node.designStyles)}`,
  ];
  if (node.text) lines.push(`${pad}Text: ${node.text}`);
  const blocks = [lines.join('\n')];
  for (const child of node.children) blocks.push(formatDesignTree(child, indent + 2));
  return blocks.join('\n\n');
}
