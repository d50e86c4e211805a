export type Rgb = {
  r: number;
  g: number;
  b: number;
};

const HEX_COLOR = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i;

export function isHexColor(value: string) {
  return HEX_COLOR.test(value);
}

export function hexToRgb(hex: string): Rgb {
  const match = HEX_COLOR.exec(hex.trim());
  if (!match) {
    throw new Error(`Invalid hex color: ${hex}`);
  }

  let digits = match[1];
  if (digits.length === 3) {
    digits = digits
      .split('')
      .map((d) => d + d)
      .join('');
  }

  return {
    r: parseInt(digits.slice(0, 2), 16),
    g: parseInt(digits.slice(2, 4), 16),
    b: parseInt(digits.slice(4, 6), 16)
  };
}

/** Plain channel mean; this is what the polarity thresholds are compared against. */
export function meanBrightness(r: number, g: number, b: number) {
  return (r + g + b) / 3;
}

/** Largest absolute per-channel difference. */
export function channelDistance(a: Rgb, b: Rgb) {
  return Math.max(Math.abs(a.r - b.r), Math.abs(a.g - b.g), Math.abs(a.b - b.b));
}
