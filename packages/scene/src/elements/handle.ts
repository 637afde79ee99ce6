import type { Bounds, Position, SceneElement, Side } from "../types";

/**
 * Positional handle for an element, fixed at creation time.
 *
 * Geometry is copied from the element when the handle is made; later edits to
 * the element are not reflected here.
 */
export class ElementHandle {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;

  constructor(element: SceneElement) {
    this.id = element.id;
    this.x = element.x;
    this.y = element.y;
    this.width = element.width;
    this.height = element.height;
  }

  get centerX(): number {
    return this.x + this.width / 2;
  }

  get centerY(): number {
    return this.y + this.height / 2;
  }

  get left(): number {
    return this.x;
  }

  get right(): number {
    return this.x + this.width;
  }

  get top(): number {
    return this.y;
  }

  get bottom(): number {
    return this.y + this.height;
  }

  get center(): Position {
    return { x: this.centerX, y: this.centerY };
  }

  get bounds(): Bounds {
    return { x: this.x, y: this.y, width: this.width, height: this.height };
  }

  /**
   * Connection point on the bounding box: the midpoint of the given side.
   */
  anchor(side: Side): Position {
    switch (side) {
      case "right":
        return { x: this.right, y: this.centerY };
      case "left":
        return { x: this.left, y: this.centerY };
      case "bottom":
        return { x: this.centerX, y: this.bottom };
      case "top":
        return { x: this.centerX, y: this.top };
    }
  }
}
