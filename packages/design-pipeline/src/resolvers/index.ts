import type { DesignStyles, Framework, StyleTable } from '../types/design';
import { BOOTSTRAP_STYLES } from './bootstrap';
import { TAILWIND_STYLES } from './tailwind';

export { BOOTSTRAP_STYLES, TAILWIND_STYLES };

/**
 * Merge the table patch of every known class, in class-list order.
 * Later patches overwrite colliding keys; unknown classes contribute nothing.
 */
export function resolveClassStyles(classes: readonly string[], table: StyleTable): DesignStyles {
  const styles: DesignStyles = {};
  for (const cls of classes) {
    if (!Object.prototype.hasOwnProperty.call(table, cls)) continue;
    // Copy so nodes never share the table's paint/effect objects
    Object.assign(styles, structuredClone(table[cls]));
  }
  return styles;
}

export function resolveBootstrapStyles(classes: readonly string[]): DesignStyles {
  return resolveClassStyles(classes, BOOTSTRAP_STYLES);
}

export function resolveTailwindStyles(classes: readonly string[]): DesignStyles {
  return resolveClassStyles(classes, TAILWIND_STYLES);
}

const TABLES: Record<Exclude<Framework, 'none'>, StyleTable> = {
  bootstrap: BOOTSTRAP_STYLES,
  tailwind: TAILWIND_STYLES,
};

export function resolveFrameworkStyles(framework: Framework, classes: readonly string[]): DesignStyles | null {
  if (framework === 'none') return null;
  return resolveClassStyles(classes, TABLES[framework]);
}
