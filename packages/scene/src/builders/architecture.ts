/**
 * Architecture diagram builder
 *
 * Every component is placed by the caller; the builder only supplies shape,
 * size and color defaults per component kind.
 */

import { Diagram, NodeRegistry, type BoxOptions, type Connector } from "../diagram";
import type { ElementHandle } from "../elements";
import type { ColorInput } from "../styles";
import type { Position } from "../types";
import type { ConnectResult } from "./types";

export interface ComponentOptions {
  width?: number;
  height?: number;
  color?: ColorInput;
}

export interface ArchitectureConnectOptions {
  label?: string;
  /** Also draw an unlabeled return arrow */
  bidirectional?: boolean;
  color?: ColorInput;
}

export class ArchitectureDiagram extends Diagram {
  private components = new NodeRegistry();

  component(key: string, label: string, position: Position, options: ComponentOptions = {}): ElementHandle {
    return this.place(key, position, label, {
      width: options.width ?? 150,
      height: options.height ?? 80,
      color: options.color ?? "blue",
      shape: "rectangle",
    });
  }

  service(key: string, label: string, position: Position, color: ColorInput = "violet"): ElementHandle {
    return this.place(key, position, label, { width: 140, height: 70, color, shape: "rectangle" });
  }

  database(key: string, label: string, position: Position, color: ColorInput = "green"): ElementHandle {
    return this.place(key, position, label, { width: 120, height: 60, color, shape: "ellipse" });
  }

  user(key: string, label = "User", position: Position = { x: 100, y: 100 }): ElementHandle {
    return this.place(key, position, label, { width: 80, height: 80, color: "gray", shape: "ellipse" });
  }

  /**
   * Arrow between two components; with `bidirectional`, a second, unlabeled
   * arrow back. Each arrow selects its own sides. Unknown keys draw nothing.
   */
  connect(fromKey: string, toKey: string, options: ArchitectureConnectOptions = {}): ConnectResult {
    const pair = this.components.lookupPair(fromKey, toKey);
    if (!pair.found) {
      return { status: "skipped", missingKeys: pair.missingKeys };
    }

    const color = options.color ?? "black";
    const connectors: Connector[] = [
      this.arrowBetween(pair.source, pair.target, { label: options.label, color }),
    ];
    if (options.bidirectional) {
      connectors.push(this.arrowBetween(pair.target, pair.source, { color }));
    }
    return { status: "connected", connectors };
  }

  getComponent(key: string): ElementHandle | undefined {
    return this.components.lookup(key);
  }

  componentKeys(): string[] {
    return this.components.keys();
  }

  private place(
    key: string,
    position: Position,
    label: string,
    options: BoxOptions,
  ): ElementHandle {
    const handle = this.box(position, label, options);
    this.components.register(key, handle);
    return handle;
  }
}
