/**
 * Core types for the Excalidraw scene model
 */

export type ShapeKind = "rectangle" | "ellipse" | "diamond";

export type ElementType = ShapeKind | "text" | "arrow" | "line";

export type FillStyle = "hachure" | "solid" | "cross-hatch" | "zigzag";

export type StrokeStyle = "solid" | "dashed" | "dotted";

export type TextAlign = "left" | "center" | "right";

export type VerticalAlign = "top" | "middle" | "bottom";

/** Arrowhead literals written to the document */
export type Arrowhead = "arrow" | "triangle" | "bar" | "circle" | "diamond";

/** Arrowhead names accepted from callers; `dot` is the legacy name of `circle` */
export type ArrowheadName = Arrowhead | "dot" | "none";

/** Connection side of a shape's bounding box */
export type Side = "top" | "right" | "bottom" | "left";

export interface Position {
  x: number;
  y: number;
}

export interface Bounds extends Position {
  width: number;
  height: number;
}

/** Relative point of a linear element, anchored at the element's own (x, y) */
export type Point = [number, number];

/**
 * Roundness descriptor. Type 3 is Excalidraw's adaptive radius.
 */
export interface Roundness {
  type: number;
}

export interface BoundElementRef {
  id: string;
  type: "text" | "arrow";
}

/**
 * Per-element overrides of the default stroke and fill styling
 */
export interface StyleOverrides {
  fillStyle?: FillStyle;
  strokeWidth?: number;
  strokeStyle?: StrokeStyle;
  roughness?: number;
  opacity?: number;
  angle?: number;
}

/**
 * Attributes present on every element, whatever its type
 */
export interface ElementBase extends Bounds {
  id: string;
  type: ElementType;
  angle: number;
  strokeColor: string;
  backgroundColor: string;
  fillStyle: FillStyle;
  strokeWidth: number;
  strokeStyle: StrokeStyle;
  roughness: number;
  opacity: number;
  seed: number;
  version: number;
  versionNonce: number;
  index: null;
  isDeleted: false;
  groupIds: string[];
  frameId: null;
  boundElements: BoundElementRef[] | null;
  updated: number;
  link: null;
  locked: false;
  roundness: Roundness | null;
}

export interface ShapeElement extends ElementBase {
  type: ShapeKind;
}

export interface TextElement extends ElementBase {
  type: "text";
  text: string;
  originalText: string;
  fontSize: number;
  /** Font family number; unknown names are written through unchanged */
  fontFamily: number | string;
  textAlign: TextAlign;
  verticalAlign: VerticalAlign;
  containerId: string | null;
  autoResize: boolean;
  lineHeight: number;
}

interface LinearElementBase extends ElementBase {
  points: Point[];
  startBinding: null;
  endBinding: null;
  startArrowhead: Arrowhead | null;
  endArrowhead: Arrowhead | null;
}

export interface ArrowElement extends LinearElementBase {
  type: "arrow";
  elbowed: boolean;
}

export interface LineElement extends LinearElementBase {
  type: "line";
}

export type SceneElement = ShapeElement | TextElement | ArrowElement | LineElement;

export interface AppState {
  gridSize: number;
  gridStep: number;
  gridModeEnabled: boolean;
  viewBackgroundColor: string;
}

/**
 * The `.excalidraw` file structure
 */
export interface SceneDocument {
  type: "excalidraw";
  version: 2;
  source: string;
  elements: SceneElement[];
  appState: AppState;
  files: Record<string, never>;
}
