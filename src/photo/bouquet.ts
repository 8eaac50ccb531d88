/** 8-bit HSV: hue 0-180 (degrees / 2), saturation and value 0-255. */
export type Hsv = { h: number; s: number; v: number };

export type HsvRange = {
  label: string;
  lower: Hsv;
  upper: Hsv;
};

/** Colour ranges typical of flower petals. Bounds are inclusive. */
export const FLORAL_RANGES: readonly HsvRange[] = [
  { label: "red", lower: { h: 0, s: 100, v: 100 }, upper: { h: 10, s: 255, v: 255 } },
  { label: "red-wrap", lower: { h: 160, s: 100, v: 100 }, upper: { h: 180, s: 255, v: 255 } },
  { label: "pink-purple", lower: { h: 125, s: 50, v: 100 }, upper: { h: 155, s: 255, v: 255 } },
  { label: "yellow", lower: { h: 20, s: 100, v: 100 }, upper: { h: 40, s: 255, v: 255 } },
  { label: "white", lower: { h: 0, s: 0, v: 200 }, upper: { h: 180, s: 30, v: 255 } },
];

export function rgbToHsv(r: number, g: number, b: number): Hsv {
  const v = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const diff = v - min;
  const s = v === 0 ? 0 : Math.round((255 * diff) / v);

  let hDeg = 0;
  if (diff !== 0) {
    if (v === r) {
      hDeg = (60 * (g - b)) / diff;
    } else if (v === g) {
      hDeg = 120 + (60 * (b - r)) / diff;
    } else {
      hDeg = 240 + (60 * (r - g)) / diff;
    }
    if (hDeg < 0) {
      hDeg += 360;
    }
  }

  return { h: Math.round(hDeg / 2), s, v };
}

function inRange(hsv: Hsv, range: HsvRange): boolean {
  return (
    hsv.h >= range.lower.h &&
    hsv.h <= range.upper.h &&
    hsv.s >= range.lower.s &&
    hsv.s <= range.upper.s &&
    hsv.v >= range.lower.v &&
    hsv.v <= range.upper.v
  );
}

export function isFloralPixel(hsv: Hsv, ranges: readonly HsvRange[] = FLORAL_RANGES): boolean {
  return ranges.some((range) => inRange(hsv, range));
}

/**
 * Fraction of pixels falling in at least one floral range.
 * `rgb` is interleaved R,G,B; a pixel matching several ranges counts once.
 */
export function floralRatio(rgb: Uint8Array, ranges: readonly HsvRange[] = FLORAL_RANGES): number {
  const pixelCount = Math.floor(rgb.length / 3);
  if (pixelCount === 0) {
    return 0;
  }
  let floral = 0;
  for (let i = 0; i < pixelCount; i++) {
    const o = i * 3;
    if (isFloralPixel(rgbToHsv(rgb[o], rgb[o + 1], rgb[o + 2]), ranges)) {
      floral++;
    }
  }
  return floral / pixelCount;
}
