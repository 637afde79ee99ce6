export {
  COLORS,
  BACKGROUND_FOR_STROKE,
  FONT_FAMILIES,
  ARROWHEADS,
  ADAPTIVE_ROUNDNESS,
  type ColorName,
  type FontFamilyName,
} from "./palette";
export {
  resolveColor,
  resolveBackgroundFor,
  resolveFont,
  resolveRoundness,
  resolveArrowhead,
  type ColorInput,
  type FontInput,
} from "./resolver";
