import type { BlurThresholds, ClassificationResult, ImageSample } from "./types.js";
import { floralRatio } from "./bouquet.js";
import { decodeImage } from "./decode.js";
import { laplacianVariance } from "./laplacian.js";

export const DEFAULT_THRESHOLDS: BlurThresholds = {
  blur_threshold: 100,
  bouquet_threshold: 70,
  bouquet_fraction: 0.15,
};

/**
 * Sharp/blurry decision for decoded pixels.
 * The floral ratio is only computed when the variance misses the base threshold.
 */
export function classify(
  sample: ImageSample,
  thresholds: BlurThresholds = DEFAULT_THRESHOLDS,
): ClassificationResult {
  const variance = laplacianVariance(sample.gray, sample.width, sample.height);

  if (variance >= thresholds.blur_threshold) {
    return {
      verdict: "sharp",
      variance,
      floral_ratio: null,
      bouquet: false,
      threshold: thresholds.blur_threshold,
    };
  }

  const ratio = sample.rgb ? floralRatio(sample.rgb) : null;
  const bouquet = ratio !== null && ratio >= thresholds.bouquet_fraction;
  const threshold = bouquet ? thresholds.bouquet_threshold : thresholds.blur_threshold;

  return {
    verdict: variance >= threshold ? "sharp" : "blurry",
    variance,
    floral_ratio: ratio,
    bouquet,
    threshold,
  };
}

/**
 * Decode and classify a file. Files whose content cannot be decoded (RAW, corrupt,
 * empty) come back as `unanalyzed`. A file that cannot be read rejects.
 */
export async function classifyFile(
  filePath: string,
  thresholds: BlurThresholds = DEFAULT_THRESHOLDS,
): Promise<ClassificationResult> {
  const decoded = await decodeImage(filePath);
  if (!decoded.ok) {
    return {
      verdict: "unanalyzed",
      variance: null,
      floral_ratio: null,
      bouquet: false,
      threshold: null,
      decode_failure: decoded.failure,
    };
  }
  return classify(decoded.sample, thresholds);
}
