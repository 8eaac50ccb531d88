/**
 * Map an out-of-range index back into [0, n) by mirroring around the edge pixel
 * (gfedcb|abcdefgh|gfedcba).
 */
function reflect101(i: number, n: number): number {
  if (n === 1) {
    return 0;
  }
  let idx = i;
  while (idx < 0 || idx >= n) {
    idx = idx < 0 ? -idx : 2 * (n - 1) - idx;
  }
  return idx;
}

/**
 * Population variance of the second-derivative response with the 4-neighbour
 * kernel [0 1 0; 1 -4 1; 0 1 0]. Higher means more edge detail.
 * Accumulated in one pass; the response image is never materialised.
 */
export function laplacianVariance(
  gray: ArrayLike<number>,
  width: number,
  height: number,
): number {
  if (gray.length !== width * height) {
    throw new Error(`Pixel count ${gray.length} does not match ${width}x${height}`);
  }
  const n = width * height;
  if (n === 0) {
    return 0;
  }
  let sum = 0;
  let sumSq = 0;
  for (let y = 0; y < height; y++) {
    const up = reflect101(y - 1, height) * width;
    const down = reflect101(y + 1, height) * width;
    const row = y * width;
    for (let x = 0; x < width; x++) {
      const left = reflect101(x - 1, width);
      const right = reflect101(x + 1, width);
      const r =
        gray[up + x] + gray[down + x] + gray[row + left] + gray[row + right] - 4 * gray[row + x];
      sum += r;
      sumSq += r * r;
    }
  }
  const mean = sum / n;
  return Math.max(0, sumSq / n - mean * mean);
}
