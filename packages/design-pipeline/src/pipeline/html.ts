import * as cheerio from 'cheerio';
import { isTag, isText, type Element } from 'domhandler';
import type { DesignNode, DesignStyles, Framework, WarnSink } from '../types/design';
import { resolveFrameworkStyles } from '../resolvers';
import { splitClassTokens, parseInlineStyle } from '../utils/css-parser';
import { applyDimensionClasses, applyImageDimensions, applyImageLayout } from '../utils/dimension';
import { resolveFontClasses, textColorFills } from '../utils/fonts';
import { applyInlineColorStyles, applyInlineFontStyles } from './inline-styles';
import { detectFramework } from './framework';

export interface ParseOptions {
  /** Receives per-property conversion failures from inline styles. Defaults to console.warn. */
  warn?: WarnSink;
}

type TransformContext = {
  framework: Framework;
  warn: WarnSink;
};

const defaultWarn: WarnSink = (message, meta) => {
  console.warn(`[design-pipeline] ${message}`, meta ?? '');
};

function hasAttr(el: Element, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(el.attribs, name);
}

function attributesOf(el: Element): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(el.attribs)) {
    if (k === 'class') continue;
    out[k] = v;
  }
  return out;
}

// Text of an element whose only content is one string, possibly wrapped in single-child elements.
function singleString(el: Element): string | null {
  if (el.children.length !== 1) return null;
  const only = el.children[0];
  if (isText(only)) return only.data;
  if (isTag(only)) return singleString(only);
  return null;
}

function transformElement(el: Element, ctx: TransformContext): DesignNode {
  const classes = splitClassTokens(el.attribs.class || '');
  const node: DesignNode = {
    tag: el.name,
    classes,
    text: null,
    attributes: attributesOf(el),
    styles: {},
    designStyles: {},
    framework: ctx.framework,
    children: [],
  };

  const direct = singleString(el);
  if (direct && direct.trim()) node.text = direct.trim();

  let styles: DesignStyles = {};
  const isImage = el.name === 'img';

  if (isImage) applyImageLayout(classes, el.attribs.src, styles);

  if (hasAttr(el, 'style')) {
    const decls = parseInlineStyle(el.attribs.style);
    node.styles = { ...decls };
    applyInlineFontStyles(decls, styles, ctx.warn);
    applyInlineColorStyles(decls, styles);
  }

  const colorFills = textColorFills(classes);
  if (colorFills.length) styles.fills = [...(styles.fills || []), ...colorFills];

  if (isImage) applyImageDimensions(classes, ctx.framework, styles);

  // The framework table replaces everything gathered so far; only the class passes below add on top.
  const tableStyles = resolveFrameworkStyles(ctx.framework, classes);
  if (tableStyles) styles = tableStyles;

  Object.assign(styles, resolveFontClasses(classes));
  applyDimensionClasses(classes, styles);
  node.designStyles = styles;

  for (const child of el.children) {
    if (isTag(child)) {
      node.children.push(transformElement(child, ctx));
    } else if (isText(child) && child.data.trim()) {
      // last text child wins, including over the direct text above
      node.text = child.data.trim();
    }
  }

  return node;
}

function emptyBody(framework: Framework): DesignNode {
  return {
    tag: 'body',
    classes: [],
    text: null,
    attributes: {},
    styles: {},
    designStyles: {},
    framework,
    children: [],
  };
}

/**
 * Convert an HTML document into a design node tree rooted at its <body>.
 * Parsing is permissive; a document without <body> yields an empty body node.
 */
export function parseHtml(html: string, options: ParseOptions = {}): DesignNode {
  // htmlparser2 keeps the tree as written (parse5 would synthesize <html>/<body>)
  const $ = cheerio.load(html, { xml: { xmlMode: false, decodeEntities: true } });
  const ctx: TransformContext = {
    framework: detectFramework($),
    warn: options.warn || defaultWarn,
  };
  const body = $('body').get(0);
  return body ? transformElement(body, ctx) : emptyBody(ctx.framework);
}

export class HtmlParser {
  constructor(private readonly options: ParseOptions = {}) {}

  parse(html: string): DesignNode {
    return parseHtml(html, this.options);
  }
}
