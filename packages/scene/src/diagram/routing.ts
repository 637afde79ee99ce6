/**
 * Connector side selection.
 *
 * Picks the pair of box sides a straight connector joins, from the relative
 * position of the two centers. No elbow routing: the connector is a single
 * segment between the two anchors.
 */

import type { ElementHandle } from "../elements";
import type { Position, Side } from "../types";

export type SideChoice = Side | "auto";

export interface SidePair {
  fromSide: Side;
  toSide: Side;
}

/**
 * Horizontal connection when the centers are further apart in x than in y,
 * vertical otherwise (ties go vertical).
 */
export function selectSides(source: Position, target: Position): SidePair {
  const dx = target.x - source.x;
  const dy = target.y - source.y;

  if (Math.abs(dx) > Math.abs(dy)) {
    return dx > 0
      ? { fromSide: "right", toSide: "left" }
      : { fromSide: "left", toSide: "right" };
  }
  return dy > 0
    ? { fromSide: "bottom", toSide: "top" }
    : { fromSide: "top", toSide: "bottom" };
}

/**
 * Resolve requested sides; any side left as "auto" takes the automatic choice.
 */
export function resolveSides(
  source: ElementHandle,
  target: ElementHandle,
  fromSide: SideChoice,
  toSide: SideChoice,
): SidePair {
  if (fromSide !== "auto" && toSide !== "auto") {
    return { fromSide, toSide };
  }
  const auto = selectSides(source.center, target.center);
  return {
    fromSide: fromSide === "auto" ? auto.fromSide : fromSide,
    toSide: toSide === "auto" ? auto.toSide : toSide,
  };
}
