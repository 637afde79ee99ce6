export {
  Diagram,
  isShapeKind,
  DEFAULT_SOURCE,
  DEFAULT_BACKGROUND,
  type DiagramOptions,
  type BoxOptions,
  type TextBoxOptions,
  type ConnectorOptions,
  type Connector,
} from "./diagram";
export { DiagramError, DiagramErrorCode } from "./errors";
export { NodeRegistry } from "./registry";
export { selectSides, resolveSides, type SideChoice, type SidePair } from "./routing";
