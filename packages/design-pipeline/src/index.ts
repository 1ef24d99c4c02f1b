export { parseHtml, HtmlParser } from './pipeline/html';
export type { ParseOptions } from './pipeline/html';
export { detectFramework } from './pipeline/framework';
export { applyInlineStyles } from './pipeline/inline-styles';
export { toDesignJson, parseDesignJson, formatDesignTree } from './pipeline/serialize';
export {
  resolveClassStyles,
  resolveBootstrapStyles,
  resolveTailwindStyles,
  resolveFrameworkStyles,
  BOOTSTRAP_STYLES,
  TAILWIND_STYLES,
} from './resolvers';
export { normalizeColor } from './utils/color';
export { parseInlineStyle } from './utils/css-parser';
export type {
  DesignNode,
  DesignNodeJson,
  DesignStyles,
  DesignStyleKey,
  DesignColor,
  SolidPaint,
  DropShadowEffect,
  Framework,
  StylePatch,
  StyleTable,
  WarnSink,
} from './types/design';
