import type { Arrowhead, ArrowheadName, Roundness } from "../types";
import {
  ADAPTIVE_ROUNDNESS,
  ARROWHEADS,
  BACKGROUND_FOR_STROKE,
  COLORS,
  FONT_FAMILIES,
  type ColorName,
  type FontFamilyName,
} from "./palette";

const colorTable = new Map<string, string>(Object.entries(COLORS));
const backgroundTable = new Map<string, string>(Object.entries(BACKGROUND_FOR_STROKE));
const fontTable = new Map<string, number>(Object.entries(FONT_FAMILIES));
const arrowheadTable = new Map<string, Arrowhead | null>(Object.entries(ARROWHEADS));

/** A palette name, or any literal the document accepts (e.g. "#a5d8ff") */
export type ColorInput = ColorName | (string & {});

export type FontInput = FontFamilyName | (string & {}) | number;

/**
 * Map a color name to its literal. Names outside the palette are returned
 * unchanged so raw hex values can be used anywhere a name is accepted.
 */
export function resolveColor(name: ColorInput): string {
  return colorTable.get(name) ?? name;
}

/**
 * Light background literal for a stroke color name.
 * Colors without a light variant resolve to "transparent".
 */
export function resolveBackgroundFor(strokeName: ColorInput): string {
  const variant = backgroundTable.get(strokeName) ?? "transparent";
  return colorTable.get(variant) ?? COLORS.transparent;
}

/**
 * Map a font family name to Excalidraw's numeric id; anything else passes through.
 */
export function resolveFont(name: FontInput): number | string {
  if (typeof name === "number") return name;
  return fontTable.get(name) ?? name;
}

export function resolveRoundness(rounded: boolean): Roundness | null {
  return rounded ? { type: ADAPTIVE_ROUNDNESS } : null;
}

/**
 * Map an arrowhead name to its document literal; `none` and absent give no arrowhead.
 */
export function resolveArrowhead(name: ArrowheadName | null | undefined): Arrowhead | null {
  if (name == null) return null;
  return arrowheadTable.get(name) ?? null;
}
