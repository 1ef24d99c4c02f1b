// Design-tool shapes produced by the HTML pipeline.
// Every key of DesignStyles is optional; a node only carries what its classes and styles produced.

export type Framework = 'none' | 'bootstrap' | 'tailwind';

export interface DesignColor { r: number; g: number; b: number; a?: number }
export type DesignVec2 = { x: number; y: number };

export interface SolidPaint {
  type: 'SOLID';
  color: DesignColor;
  opacity?: number;
}

export interface DropShadowEffect {
  type: 'DROP_SHADOW';
  color: DesignColor;
  offset: DesignVec2;
  radius: number;
}

export type LayoutMode = 'NONE' | 'HORIZONTAL' | 'VERTICAL';
export type AxisAlign = 'MIN' | 'CENTER' | 'MAX';
export type ConstraintType = 'MIN' | 'MAX' | 'CENTER' | 'STRETCH' | 'SCALE';
export type Positioning = 'AUTO' | 'ABSOLUTE';

// number => px; string => raw CSS length such as '100%' or '100vw'
export type Dimension = number | string;

export interface LineHeight { unit: 'PIXELS'; value: number }

export interface DesignStyles {
  // layout
  layoutMode?: LayoutMode;
  primaryAxisAlignItems?: AxisAlign;
  counterAxisAlignItems?: AxisAlign;
  itemSpacing?: number;
  constraints?: { horizontal: ConstraintType; vertical: ConstraintType };
  // sizing
  width?: Dimension;
  height?: Dimension;
  minWidth?: Dimension;
  maxWidth?: Dimension;
  // spacing
  paddingTop?: number;
  paddingRight?: number;
  paddingBottom?: number;
  paddingLeft?: number;
  marginTop?: number;
  marginRight?: number;
  marginBottom?: number;
  marginLeft?: number;
  // typography
  fontSize?: number;
  fontWeight?: number;
  lineHeight?: number | LineHeight;
  textAlign?: string;
  // fill / stroke
  fills?: SolidPaint[];
  background?: SolidPaint[];
  strokes?: SolidPaint[];
  strokeWeight?: number;
  cornerRadius?: number;
  // effects
  effects?: DropShadowEffect[];
  // positioning
  positioning?: Positioning;
  x?: number;
  y?: number;
  // image metadata
  imageHash?: string;
}

export type DesignStyleKey = keyof DesignStyles;
export type StylePatch = Readonly<DesignStyles>;
export type StyleTable = Readonly<Record<string, StylePatch>>;

export interface DesignNode {
  tag: string;
  classes: string[];
  text: string | null;
  attributes: Record<string, string>;
  styles: Record<string, string>;
  designStyles: DesignStyles;
  framework: Framework;
  children: DesignNode[];
}

/** Wire shape of a node, as returned by the HTTP endpoint and written to disk. */
export interface DesignNodeJson {
  tag: string;
  classes: string[];
  text: string | null;
  attributes: Record<string, string>;
  figma_styles: DesignStyles;
  children: DesignNodeJson[];
}

export type WarnSink = (message: string, meta?: Record<string, unknown>) => void;
