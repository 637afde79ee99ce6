/**
 * Element Factory
 *
 * Builds complete, schema-valid Excalidraw elements. Every element gets a
 * fresh id from the identity source and two independent integers from the
 * jitter source (`seed` for roughjs, `versionNonce` for conflict detection).
 */

import {
  createRandomIdentity,
  createRandomJitter,
  type IdentitySource,
  type JitterSource,
} from "../identity";
import {
  resolveArrowhead,
  resolveBackgroundFor,
  resolveColor,
  resolveFont,
  resolveRoundness,
  type ColorInput,
  type FontInput,
} from "../styles";
import type {
  ArrowElement,
  ArrowheadName,
  Bounds,
  ElementBase,
  ElementType,
  LineElement,
  Point,
  Position,
  Roundness,
  ShapeElement,
  ShapeKind,
  StyleOverrides,
  TextAlign,
  TextElement,
} from "../types";

// ---- Constants ----

/** Average glyph width as a fraction of font size */
export const TEXT_WIDTH_FACTOR = 0.6;
/** Line box height as a fraction of font size */
export const TEXT_HEIGHT_FACTOR = 1.35;
export const TEXT_LINE_HEIGHT = 1.25;
export const CONNECTOR_LABEL_FONT_SIZE = 16;
/** Connector labels sit this far above the segment midpoint */
export const CONNECTOR_LABEL_OFFSET = 20;

const DEFAULT_STROKE = "black";

// ---- Options ----

export interface ElementFactoryOptions {
  identity?: IdentitySource;
  jitter?: JitterSource;
}

export interface ShapeOptions {
  color?: ColorInput;
  /** Fill with the color's light variant (default true) */
  fill?: boolean;
  style?: StyleOverrides;
}

export interface RectangleOptions extends ShapeOptions {
  /** Adaptive rounded corners (default true) */
  rounded?: boolean;
}

export interface TextOptions {
  fontSize?: number;
  fontFamily?: FontInput;
  color?: ColorInput;
  align?: TextAlign;
  style?: StyleOverrides;
}

export interface ArrowOptions {
  color?: ColorInput;
  startHead?: ArrowheadName | null;
  endHead?: ArrowheadName | null;
  label?: string;
  style?: StyleOverrides;
}

export interface LineOptions {
  color?: ColorInput;
  style?: StyleOverrides;
}

/** The arrow, followed by its label when one was requested */
export type ArrowElements = [ArrowElement, ...TextElement[]];

type SegmentBase = ElementBase & Pick<ArrowElement, "points" | "startBinding" | "endBinding">;

/**
 * Size estimate used for standalone text: longest line (in code points) by
 * line count. Excalidraw re-measures glyphs when the file is opened.
 */
export function estimateTextSize(
  content: string,
  fontSize: number,
): { width: number; height: number } {
  const lines = content.length === 0 ? [] : content.split("\n");
  const longest = lines.reduce((max, line) => Math.max(max, [...line].length), 0);
  return {
    width: longest * fontSize * TEXT_WIDTH_FACTOR,
    height: lines.length * fontSize * TEXT_HEIGHT_FACTOR,
  };
}

export class ElementFactory {
  readonly identity: IdentitySource;
  private readonly jitter: JitterSource;

  constructor(options: ElementFactoryOptions = {}) {
    this.identity = options.identity ?? createRandomIdentity();
    this.jitter = options.jitter ?? createRandomJitter();
  }

  rectangle(bounds: Bounds, options: RectangleOptions = {}): ShapeElement {
    return this.shape("rectangle", bounds, options, resolveRoundness(options.rounded ?? true));
  }

  ellipse(bounds: Bounds, options: ShapeOptions = {}): ShapeElement {
    return this.shape("ellipse", bounds, options, null);
  }

  diamond(bounds: Bounds, options: ShapeOptions = {}): ShapeElement {
    return this.shape("diamond", bounds, options, null);
  }

  text(position: Position, content: string, options: TextOptions = {}): TextElement {
    const fontSize = options.fontSize ?? 20;
    const { width, height } = estimateTextSize(content, fontSize);

    return {
      ...this.base("text", { ...position, width, height }, resolveColor(options.color ?? DEFAULT_STROKE), "transparent", null, options.style),
      type: "text",
      text: content,
      originalText: content,
      fontSize,
      fontFamily: resolveFont(options.fontFamily ?? "hand"),
      textAlign: options.align ?? "center",
      verticalAlign: "top",
      containerId: null,
      autoResize: true,
      lineHeight: TEXT_LINE_HEIGHT,
    };
  }

  /**
   * Straight arrow from `start` to `end`, plus a label text element when
   * `label` is non-empty. The label is placed above the midpoint whatever
   * the segment's orientation.
   */
  arrow(start: Position, end: Position, options: ArrowOptions = {}): ArrowElements {
    const color = options.color ?? DEFAULT_STROKE;
    const dx = end.x - start.x;
    const dy = end.y - start.y;

    const arrow: ArrowElement = {
      ...this.segment("arrow", start, dx, dy, resolveColor(color), options.style),
      type: "arrow",
      startArrowhead: resolveArrowhead(options.startHead),
      endArrowhead: options.endHead === undefined ? "arrow" : resolveArrowhead(options.endHead),
      elbowed: false,
    };

    if (!options.label) {
      return [arrow];
    }

    const label = this.text(
      { x: start.x + dx / 2, y: start.y + dy / 2 - CONNECTOR_LABEL_OFFSET },
      options.label,
      { fontSize: CONNECTOR_LABEL_FONT_SIZE, color },
    );
    return [arrow, label];
  }

  line(start: Position, end: Position, options: LineOptions = {}): LineElement {
    const dx = end.x - start.x;
    const dy = end.y - start.y;

    return {
      ...this.segment("line", start, dx, dy, resolveColor(options.color ?? DEFAULT_STROKE), options.style),
      type: "line",
      startArrowhead: null,
      endArrowhead: null,
    };
  }

  // ---- Internals ----

  private shape(
    kind: ShapeKind,
    bounds: Bounds,
    options: ShapeOptions,
    roundness: Roundness | null,
  ): ShapeElement {
    const color = options.color ?? DEFAULT_STROKE;
    const background = (options.fill ?? true) ? resolveBackgroundFor(color) : "transparent";

    return {
      ...this.base(kind, bounds, resolveColor(color), background, roundness, options.style),
      type: kind,
    };
  }

  /** Linear element geometry: anchored at start, extent is always non-negative */
  private segment(
    type: "arrow" | "line",
    start: Position,
    dx: number,
    dy: number,
    strokeColor: string,
    style: StyleOverrides | undefined,
  ): SegmentBase {
    const points: Point[] = [
      [0, 0],
      [dx, dy],
    ];
    return {
      ...this.base(type, { x: start.x, y: start.y, width: Math.abs(dx), height: Math.abs(dy) }, strokeColor, "transparent", null, style),
      points,
      startBinding: null,
      endBinding: null,
    };
  }

  private base(
    type: ElementType,
    bounds: Bounds,
    strokeColor: string,
    backgroundColor: string,
    roundness: Roundness | null,
    style: StyleOverrides = {},
  ): ElementBase {
    return {
      id: this.identity.nextId(),
      type,
      x: bounds.x,
      y: bounds.y,
      width: bounds.width,
      height: bounds.height,
      angle: style.angle ?? 0,
      strokeColor,
      backgroundColor,
      fillStyle: style.fillStyle ?? "solid",
      strokeWidth: style.strokeWidth ?? 2,
      strokeStyle: style.strokeStyle ?? "solid",
      roughness: style.roughness ?? 1,
      opacity: style.opacity ?? 100,
      seed: this.jitter.nextSeed(),
      version: 1,
      versionNonce: this.jitter.nextSeed(),
      index: null,
      isDeleted: false,
      groupIds: [],
      frameId: null,
      boundElements: null,
      updated: 1,
      link: null,
      locked: false,
      roundness,
    };
  }
}
