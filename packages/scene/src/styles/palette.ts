/**
 * Excalidraw style tables.
 *
 * Stroke colors are open-color shade 9, backgrounds shade 1 of the same hue,
 * matching the swatches in the Excalidraw color picker.
 */

export const COLORS = {
  black: "#1e1e1e",
  white: "#ffffff",
  transparent: "transparent",
  red: "#e03131",
  pink: "#c2255c",
  grape: "#9c36b5",
  violet: "#6741d9",
  blue: "#1971c2",
  cyan: "#0c8599",
  teal: "#099268",
  green: "#2f9e44",
  yellow: "#f08c00",
  orange: "#e8590c",
  gray: "#868e96",
  red_bg: "#ffe3e3",
  pink_bg: "#ffdeeb",
  grape_bg: "#f3d9fa",
  violet_bg: "#e5dbff",
  blue_bg: "#d0ebff",
  cyan_bg: "#c5f6fa",
  teal_bg: "#c3fae8",
  green_bg: "#d3f9d8",
  yellow_bg: "#fff3bf",
  orange_bg: "#ffe8cc",
  gray_bg: "#e9ecef",
} as const;

export type ColorName = keyof typeof COLORS;

/** Light background variant for each stroke color */
export const BACKGROUND_FOR_STROKE = {
  red: "red_bg",
  pink: "pink_bg",
  grape: "grape_bg",
  violet: "violet_bg",
  blue: "blue_bg",
  cyan: "cyan_bg",
  teal: "teal_bg",
  green: "green_bg",
  yellow: "yellow_bg",
  orange: "orange_bg",
  gray: "gray_bg",
  black: "transparent",
} as const satisfies Partial<Record<ColorName, ColorName>>;

export const FONT_FAMILIES = {
  /** Virgil, hand-drawn */
  hand: 1,
  /** Helvetica */
  normal: 2,
  /** Cascadia, monospace */
  code: 3,
  excalifont: 5,
} as const;

export type FontFamilyName = keyof typeof FONT_FAMILIES;

/** Adaptive corner radius */
export const ADAPTIVE_ROUNDNESS = 3;

export const ARROWHEADS = {
  arrow: "arrow",
  triangle: "triangle",
  bar: "bar",
  dot: "circle",
  circle: "circle",
  diamond: "diamond",
  none: null,
} as const;
