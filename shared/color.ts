// ============================================
// Colors
// ============================================

/**
 * RGBA color with every channel in [0, 1]
 */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Build a color from a 0xRRGGBB literal
 */
export function colorFromHex(hex: number, alpha: number = 1): Color {
  return {
    r: ((hex & 0xff0000) >> 16) / 255,
    g: ((hex & 0x00ff00) >> 8) / 255,
    b: (hex & 0x0000ff) / 255,
    a: alpha,
  };
}

export function withAlpha(color: Color, alpha: number): Color {
  return { r: color.r, g: color.g, b: color.b, a: alpha };
}

export const Palette = {
  red: colorFromHex(0xab3722),
  blue: colorFromHex(0x263cab),
  green: colorFromHex(0x36a632),
  purple: colorFromHex(0x732c91),
  orange: colorFromHex(0xe05600),
  brown: colorFromHex(0x4a2d1a),
  yellow: colorFromHex(0xf5f06e),
  darkGrey: colorFromHex(0x1c1b18),
  lightGrey: colorFromHex(0x636363),
  white: colorFromHex(0xffffff),
} as const;
