export {
  ElementFactory,
  estimateTextSize,
  TEXT_WIDTH_FACTOR,
  TEXT_HEIGHT_FACTOR,
  TEXT_LINE_HEIGHT,
  CONNECTOR_LABEL_FONT_SIZE,
  CONNECTOR_LABEL_OFFSET,
  type ElementFactoryOptions,
  type ShapeOptions,
  type RectangleOptions,
  type TextOptions,
  type ArrowOptions,
  type LineOptions,
  type ArrowElements,
} from "./factory";
export { ElementHandle } from "./handle";
