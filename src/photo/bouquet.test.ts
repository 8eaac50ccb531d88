import { describe, expect, it } from "vitest";
import { floralRatio, isFloralPixel, rgbToHsv } from "./bouquet.js";

describe("rgbToHsv", () => {
  it("uses half-degree hue and 0-255 saturation/value", () => {
    expect(rgbToHsv(255, 0, 0)).toEqual({ h: 0, s: 255, v: 255 });
    expect(rgbToHsv(255, 255, 0)).toEqual({ h: 30, s: 255, v: 255 });
    expect(rgbToHsv(0, 0, 255)).toEqual({ h: 120, s: 255, v: 255 });
    expect(rgbToHsv(255, 0, 255)).toEqual({ h: 150, s: 255, v: 255 });
  });

  it("has zero hue and saturation for greys", () => {
    expect(rgbToHsv(0, 0, 0)).toEqual({ h: 0, s: 0, v: 0 });
    expect(rgbToHsv(128, 128, 128)).toEqual({ h: 0, s: 0, v: 128 });
    expect(rgbToHsv(255, 255, 255)).toEqual({ h: 0, s: 0, v: 255 });
  });
});

describe("isFloralPixel", () => {
  it("accepts red, magenta, yellow and white petals", () => {
    expect(isFloralPixel(rgbToHsv(255, 0, 0))).toBe(true);
    expect(isFloralPixel(rgbToHsv(255, 0, 255))).toBe(true);
    expect(isFloralPixel(rgbToHsv(255, 255, 0))).toBe(true);
    expect(isFloralPixel(rgbToHsv(255, 255, 255))).toBe(true);
  });

  it("rejects blue, green and mid grey", () => {
    expect(isFloralPixel(rgbToHsv(0, 0, 255))).toBe(false);
    expect(isFloralPixel(rgbToHsv(0, 255, 0))).toBe(false);
    expect(isFloralPixel(rgbToHsv(128, 128, 128))).toBe(false);
  });

  it("rejects dark reds below the value floor", () => {
    expect(isFloralPixel(rgbToHsv(90, 0, 0))).toBe(false);
  });
});

describe("floralRatio", () => {
  it("is the share of floral pixels", () => {
    const rgb = Uint8Array.from([255, 0, 0, 0, 0, 255, 0, 0, 255, 0, 0, 255]);
    expect(floralRatio(rgb)).toBe(0.25);
  });

  it("is zero for no pixels", () => {
    expect(floralRatio(new Uint8Array(0))).toBe(0);
  });
});
