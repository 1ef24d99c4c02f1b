import type { StyleTable } from '../types/design';

// Bootstrap spacing and radius scale: 1rem = 16px
export const BOOTSTRAP_STYLES: StyleTable = {
  // Layout
  'd-flex': { layoutMode: 'HORIZONTAL', primaryAxisAlignItems: 'MIN', counterAxisAlignItems: 'MIN' },
  'flex-column': { layoutMode: 'VERTICAL', primaryAxisAlignItems: 'MIN', counterAxisAlignItems: 'MIN' },
  'align-items-center': { counterAxisAlignItems: 'CENTER' },
  'justify-content-center': { primaryAxisAlignItems: 'CENTER' },
  'gap-3': { itemSpacing: 16 },

  // Sizing
  'w-100': { constraints: { horizontal: 'SCALE', vertical: 'SCALE' }, minWidth: 0 },
  'h-25': { height: '25%' },
  'mw-100': { maxWidth: '100%' },

  // Spacing
  'p-3': { paddingTop: 16, paddingBottom: 16, paddingLeft: 16, paddingRight: 16 },
  'py-2': { paddingTop: 8, paddingBottom: 8 },
  'px-4': { paddingLeft: 24, paddingRight: 24 },
  'mb-4': { marginBottom: 24 },

  // Typography
  'fs-4': { fontSize: 24, lineHeight: 32 },
  'fs-6': { fontSize: 16, lineHeight: 24 },
  'fw-bold': { fontWeight: 700 },
  'text-white': { fills: [{ type: 'SOLID', color: { r: 1, g: 1, b: 1 } }] },

  // Background
  'bg-primary': { fills: [{ type: 'SOLID', color: { r: 0.13, g: 0.53, b: 0.96 } }] },
  'bg-light': { fills: [{ type: 'SOLID', color: { r: 0.96, g: 0.96, b: 0.96 } }] },

  // Borders
  'border': { strokes: [{ type: 'SOLID', color: { r: 0.9, g: 0.9, b: 0.9 } }], strokeWeight: 1 },
  'rounded': { cornerRadius: 4 },
  'rounded-3': { cornerRadius: 16 },

  // Shadows
  'shadow-sm': {
    effects: [{ type: 'DROP_SHADOW', color: { r: 0, g: 0, b: 0, a: 0.1 }, offset: { x: 0, y: 1 }, radius: 2 }],
  },

  // Positioning
  'position-absolute': { positioning: 'ABSOLUTE' },
  'top-0': { y: 0 },
  'start-0': { x: 0 },
};
