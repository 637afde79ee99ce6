/**
 * Flowchart builder
 *
 * Places nodes along one axis from a write cursor. The cursor only moves
 * forward; `positionAt` jumps it without any collision check against
 * nodes already placed.
 */

import { Diagram, NodeRegistry, type DiagramOptions } from "../diagram";
import type { ElementHandle } from "../elements";
import type { ColorInput } from "../styles";
import type { Position, ShapeKind } from "../types";
import type { ConnectResult } from "./types";

export type FlowDirection = "vertical" | "horizontal";

/** Registry keys reserved for start and end nodes */
export const START_KEY = "__start__";
export const END_KEY = "__end__";

export const NODE_WIDTH = 150;
export const NODE_HEIGHT = 60;
export const DECISION_WIDTH = 120;
export const DECISION_HEIGHT = 80;

export interface FlowchartOptions extends DiagramOptions {
  direction?: FlowDirection;
  /** Gap between consecutive nodes (default 80) */
  spacing?: number;
  /** First cursor position (default 100, 100) */
  origin?: Position;
}

export interface FlowNodeOptions {
  shape?: ShapeKind;
  color?: ColorInput;
  width?: number;
  height?: number;
}

export interface FlowConnectOptions {
  label?: string;
  color?: ColorInput;
}

export class Flowchart extends Diagram {
  readonly direction: FlowDirection;
  readonly spacing: number;

  private nodes = new NodeRegistry();
  private cursor: Position;

  constructor(options: FlowchartOptions = {}) {
    super(options);
    this.direction = options.direction ?? "vertical";
    this.spacing = options.spacing ?? 80;
    this.cursor = { ...(options.origin ?? { x: 100, y: 100 }) };
  }

  /** Where the next node will be placed */
  get nextPosition(): Position {
    return { ...this.cursor };
  }

  /**
   * Place a node at the cursor, register it under `key`, and advance the cursor.
   */
  node(key: string, label: string, options: FlowNodeOptions = {}): ElementHandle {
    const width = options.width ?? NODE_WIDTH;
    const height = options.height ?? NODE_HEIGHT;

    const handle = this.box(this.cursor, label, {
      width,
      height,
      color: options.color ?? "blue",
      shape: options.shape ?? "rectangle",
    });
    this.nodes.register(key, handle);

    if (this.direction === "vertical") {
      this.cursor = { x: this.cursor.x, y: this.cursor.y + height + this.spacing };
    } else {
      this.cursor = { x: this.cursor.x + width + this.spacing, y: this.cursor.y };
    }

    return handle;
  }

  start(label = "Start"): ElementHandle {
    return this.node(START_KEY, label, { shape: "ellipse", color: "green" });
  }

  end(label = "End"): ElementHandle {
    return this.node(END_KEY, label, { shape: "ellipse", color: "red" });
  }

  process(key: string, label: string, color: ColorInput = "blue"): ElementHandle {
    return this.node(key, label, { shape: "rectangle", color });
  }

  decision(key: string, label: string, color: ColorInput = "yellow"): ElementHandle {
    return this.node(key, label, {
      shape: "diamond",
      color,
      width: DECISION_WIDTH,
      height: DECISION_HEIGHT,
    });
  }

  /**
   * Arrow between two registered nodes. Unknown keys draw nothing.
   */
  connect(fromKey: string, toKey: string, options: FlowConnectOptions = {}): ConnectResult {
    const pair = this.nodes.lookupPair(fromKey, toKey);
    if (!pair.found) {
      return { status: "skipped", missingKeys: pair.missingKeys };
    }

    const connector = this.arrowBetween(pair.source, pair.target, {
      label: options.label,
      color: options.color ?? "black",
    });
    return { status: "connected", connectors: [connector] };
  }

  /**
   * Move the cursor without placing anything.
   */
  positionAt(x: number, y: number): this {
    this.cursor = { x, y };
    return this;
  }

  getNode(key: string): ElementHandle | undefined {
    return this.nodes.lookup(key);
  }

  nodeKeys(): string[] {
    return this.nodes.keys();
  }
}
