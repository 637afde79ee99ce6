/**
 * @sketchloom/scene - Excalidraw document builder
 *
 * Typed elements, labeled boxes, auto-routed connectors, and flowchart /
 * architecture builders that serialize to the `.excalidraw` format.
 */

// ---- Model ----
export type {
  AppState,
  Arrowhead,
  ArrowheadName,
  ArrowElement,
  BoundElementRef,
  Bounds,
  ElementBase,
  ElementType,
  FillStyle,
  LineElement,
  Point,
  Position,
  Roundness,
  SceneDocument,
  SceneElement,
  ShapeElement,
  ShapeKind,
  Side,
  StrokeStyle,
  StyleOverrides,
  TextAlign,
  TextElement,
  VerticalAlign,
} from "./types";

// ---- Styles ----
export * from "./styles";

// ---- Identity ----
export {
  createCounterIdentity,
  createCounterJitter,
  createRandomIdentity,
  createRandomJitter,
  SEED_MAX,
  type IdentitySource,
  type JitterSource,
} from "./identity";

// ---- Elements ----
export * from "./elements";

// ---- Diagram ----
export * from "./diagram";

// ---- Builders ----
export * from "./builders";
