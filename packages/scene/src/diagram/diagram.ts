/**
 * Diagram
 *
 * An append-only, ordered list of elements (order is paint order) with the
 * composite operations used to build a scene: labeled boxes, standalone
 * text, auto-routed connectors and groups.
 */

import {
  ElementFactory,
  ElementHandle,
  type ArrowElements,
  type ElementFactoryOptions,
} from "../elements";
import type { ColorInput, FontInput } from "../styles";
import type {
  LineElement,
  Position,
  SceneDocument,
  SceneElement,
  ShapeElement,
  ShapeKind,
  Side,
  StyleOverrides,
  TextAlign,
} from "../types";
import { DiagramError, DiagramErrorCode } from "./errors";
import { resolveSides, type SideChoice } from "./routing";

export const DEFAULT_SOURCE = "https://excalidraw.com";
export const DEFAULT_BACKGROUND = "#ffffff";

const SHAPE_KINDS: ReadonlySet<string> = new Set<ShapeKind>(["rectangle", "ellipse", "diamond"]);

export function isShapeKind(value: string): value is ShapeKind {
  return SHAPE_KINDS.has(value);
}

export interface DiagramOptions extends ElementFactoryOptions {
  /** Canvas background (default white) */
  background?: string;
  /** `source` field of the document */
  source?: string;
}

export interface BoxOptions {
  width?: number;
  height?: number;
  color?: ColorInput;
  shape?: ShapeKind;
  fontSize?: number;
  fill?: boolean;
  /** Rounded corners, rectangles only (default true) */
  rounded?: boolean;
  style?: StyleOverrides;
}

export interface TextBoxOptions {
  fontSize?: number;
  fontFamily?: FontInput;
  color?: ColorInput;
  align?: TextAlign;
}

export interface ConnectorOptions {
  label?: string;
  color?: ColorInput;
  fromSide?: SideChoice;
  toSide?: SideChoice;
}

/**
 * Elements created for one connector, with the sides it was anchored to
 */
export interface Connector {
  elements: ArrowElements;
  fromSide: Side;
  toSide: Side;
}

export class Diagram {
  readonly background: string;
  readonly source: string;
  protected readonly factory: ElementFactory;

  private elements: SceneElement[] = [];
  private indexById: Map<string, number> = new Map();

  constructor(options: DiagramOptions = {}) {
    this.background = options.background ?? DEFAULT_BACKGROUND;
    this.source = options.source ?? DEFAULT_SOURCE;
    this.factory = new ElementFactory(options);
  }

  /**
   * Append raw elements, individually or as lists. Nothing is appended when
   * any id is already in the diagram or repeats within the call.
   *
   * @throws DiagramError DUPLICATE_ELEMENT
   */
  add(...items: Array<SceneElement | SceneElement[]>): void {
    const batch = items.flat();
    const seen = new Set<string>();
    for (const element of batch) {
      if (this.indexById.has(element.id) || seen.has(element.id)) {
        throw new DiagramError(
          DiagramErrorCode.DUPLICATE_ELEMENT,
          `Element "${element.id}" is already part of this diagram`,
          element.id,
        );
      }
      seen.add(element.id);
    }
    for (const element of batch) {
      this.append(element);
    }
  }

  getElements(): readonly SceneElement[] {
    return this.elements;
  }

  getElement(id: string): SceneElement | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.elements[index];
  }

  get size(): number {
    return this.elements.length;
  }

  /**
   * Labeled shape. The label is a text element bound to the shape: it takes the
   * shape's bounds and is centered by Excalidraw via its alignment flags.
   *
   * @returns handle of the shape, not the label
   * @throws DiagramError INVALID_SHAPE for an unknown shape kind
   */
  box(position: Position, label: string, options: BoxOptions = {}): ElementHandle {
    const width = options.width ?? 150;
    const height = options.height ?? 60;
    const color = options.color ?? "blue";
    const shapeKind: string = options.shape ?? "rectangle";
    if (!isShapeKind(shapeKind)) {
      throw new DiagramError(
        DiagramErrorCode.INVALID_SHAPE,
        `Unknown shape "${shapeKind}". Expected one of: ${[...SHAPE_KINDS].join(", ")}`,
        shapeKind,
      );
    }
    const bounds = { ...position, width, height };

    let shape: ShapeElement;
    const shapeOptions = { color, fill: options.fill, style: options.style };
    switch (shapeKind) {
      case "rectangle":
        shape = this.factory.rectangle(bounds, { ...shapeOptions, rounded: options.rounded });
        break;
      case "ellipse":
        shape = this.factory.ellipse(bounds, shapeOptions);
        break;
      case "diamond":
        shape = this.factory.diamond(bounds, shapeOptions);
        break;
    }

    const text = this.factory.text(position, label, { fontSize: options.fontSize ?? 18, color });

    shape.boundElements = [{ id: text.id, type: "text" }];
    text.containerId = shape.id;
    text.textAlign = "center";
    text.verticalAlign = "middle";
    text.x = shape.x;
    text.y = shape.y;
    text.width = shape.width;
    text.height = shape.height;

    this.add(shape, text);
    return new ElementHandle(shape);
  }

  /**
   * Standalone text with no container.
   */
  textBox(position: Position, content: string, options: TextBoxOptions = {}): ElementHandle {
    const text = this.factory.text(position, content, {
      fontSize: options.fontSize ?? 20,
      fontFamily: options.fontFamily,
      color: options.color ?? "black",
      align: options.align,
    });
    this.add(text);
    return new ElementHandle(text);
  }

  /**
   * Straight arrow between two handles. With both sides "auto" the sides are
   * chosen from the relative position of the centers.
   */
  arrowBetween(source: ElementHandle, target: ElementHandle, options: ConnectorOptions = {}): Connector {
    const { fromSide, toSide } = resolveSides(
      source,
      target,
      options.fromSide ?? "auto",
      options.toSide ?? "auto",
    );

    const elements = this.factory.arrow(source.anchor(fromSide), target.anchor(toSide), {
      color: options.color ?? "black",
      label: options.label,
    });
    this.add(elements);
    return { elements, fromSide, toSide };
  }

  /**
   * Plain line joining the two centers.
   */
  lineBetween(source: ElementHandle, target: ElementHandle, options: { color?: ColorInput } = {}): LineElement {
    const line = this.factory.line(source.center, target.center, { color: options.color ?? "black" });
    this.add(line);
    return line;
  }

  /**
   * Add the elements to a new group. Existing memberships are kept, so groups nest.
   * A handle passed more than once joins the group once.
   *
   * @returns the new group id
   * @throws DiagramError UNKNOWN_ELEMENT if a handle does not belong to this diagram
   */
  group(...handles: ElementHandle[]): string {
    const unique = new Map(handles.map((handle): [string, ElementHandle] => [handle.id, handle]));
    const members = [...unique.values()].map((handle) => {
      const element = this.getElement(handle.id);
      if (!element) {
        throw new DiagramError(
          DiagramErrorCode.UNKNOWN_ELEMENT,
          `Element "${handle.id}" is not part of this diagram`,
          handle.id,
        );
      }
      return element;
    });

    const groupId = this.factory.identity.nextId();
    for (const element of members) {
      element.groupIds.push(groupId);
    }
    return groupId;
  }

  toDocument(): SceneDocument {
    return {
      type: "excalidraw",
      version: 2,
      source: this.source,
      elements: [...this.elements],
      appState: {
        gridSize: 20,
        gridStep: 5,
        gridModeEnabled: false,
        viewBackgroundColor: this.background,
      },
      files: {},
    };
  }

  /**
   * JSON text of the document. Non-ASCII content is written as-is.
   */
  serialize(indent = 2): string {
    return JSON.stringify(this.toDocument(), null, indent);
  }

  private append(element: SceneElement): void {
    this.indexById.set(element.id, this.elements.length);
    this.elements.push(element);
  }
}
