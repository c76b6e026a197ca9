import type { Vec3 } from "../core/vectors";

/** RGB color, each channel 0..255. */
export type ColorRGB = Vec3;

export const WHITE: Readonly<ColorRGB> = [255, 255, 255];
export const BLACK: Readonly<ColorRGB> = [0, 0, 0];

/**
 * Parses `#rgb` or `#rrggbb` into an RGB triple.
 */
export function hexToRgb(hex: string): ColorRGB {
  const match = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex.trim());
  if (!match) {
    throw new Error(`Invalid hex color: ${hex}`);
  }
  let digits = match[1];
  if (digits.length === 3) {
    digits = digits
      .split("")
      .map((d) => d + d)
      .join("");
  }
  return [
    parseInt(digits.slice(0, 2), 16),
    parseInt(digits.slice(2, 4), 16),
    parseInt(digits.slice(4, 6), 16),
  ];
}

/**
 * Convert an RGB color to a CSS rgba() string.
 */
export function rgbToCss(color: Readonly<ColorRGB>, alpha = 1): string {
  const [r, g, b] = color.map((c) => Math.max(0, Math.min(255, Math.round(c))));
  return `rgba(${r}, ${g}, ${b}, ${alpha.toFixed(3)})`;
}
