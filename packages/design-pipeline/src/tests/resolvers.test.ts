import { describe, it, expect } from 'vitest';
import {
  resolveBootstrapStyles,
  resolveTailwindStyles,
  resolveFrameworkStyles,
  TAILWIND_STYLES,
} from '../resolvers';

describe('resolveBootstrapStyles', () => {
  it('maps flex, alignment and padding classes', () => {
    expect(resolveBootstrapStyles(['d-flex', 'align-items-center', 'p-3'])).toEqual({
      layoutMode: 'HORIZONTAL',
      primaryAxisAlignItems: 'MIN',
      counterAxisAlignItems: 'CENTER',
      paddingTop: 16,
      paddingBottom: 16,
      paddingLeft: 16,
      paddingRight: 16,
    });
  });

  it('lets the later class in the list win on colliding keys', () => {
    expect(resolveBootstrapStyles(['align-items-center', 'd-flex']).counterAxisAlignItems).toBe('MIN');
    expect(resolveBootstrapStyles(['d-flex', 'flex-column']).layoutMode).toBe('VERTICAL');
  });

  it('ignores classes outside the table', () => {
    expect(resolveBootstrapStyles(['btn', 'constructor', 'toString'])).toEqual({});
  });

  it('reads shadows and percentage sizes', () => {
    expect(resolveBootstrapStyles(['shadow-sm', 'h-25', 'mw-100'])).toEqual({
      effects: [{ type: 'DROP_SHADOW', color: { r: 0, g: 0, b: 0, a: 0.1 }, offset: { x: 0, y: 1 }, radius: 2 }],
      height: '25%',
      maxWidth: '100%',
    });
  });
});

describe('resolveTailwindStyles', () => {
  it('maps a typical card', () => {
    expect(resolveTailwindStyles(['flex', 'items-center', 'justify-center', 'p-4', 'bg-surface', 'rounded-xl'])).toEqual({
      layoutMode: 'HORIZONTAL',
      primaryAxisAlignItems: 'CENTER',
      counterAxisAlignItems: 'CENTER',
      paddingTop: 16,
      paddingBottom: 16,
      paddingLeft: 16,
      paddingRight: 16,
      fills: [{ type: 'SOLID', color: { r: 1, g: 1, b: 1 } }],
      cornerRadius: 12,
    });
  });

  it('does not hand out the table objects', () => {
    const styles = resolveTailwindStyles(['bg-surface']);
    expect(styles.fills).not.toBe(TAILWIND_STYLES['bg-surface'].fills);
    styles.fills?.push({ type: 'SOLID', color: { r: 0, g: 0, b: 0 } });
    expect(TAILWIND_STYLES['bg-surface'].fills).toHaveLength(1);
  });
});

describe('resolveFrameworkStyles', () => {
  it('returns null without a framework', () => {
    expect(resolveFrameworkStyles('none', ['flex'])).toBeNull();
  });

  it('picks the table of the framework', () => {
    expect(resolveFrameworkStyles('tailwind', ['mb-4'])).toEqual({ marginBottom: 16 });
    expect(resolveFrameworkStyles('bootstrap', ['mb-4'])).toEqual({ marginBottom: 24 });
  });
});
