export { classify, classifyFile, DEFAULT_THRESHOLDS } from "./photo/classify.js";
export { decodeImage } from "./photo/decode.js";
export { floralRatio, rgbToHsv } from "./photo/bouquet.js";
export { laplacianVariance } from "./photo/laplacian.js";
export { resolveCaptureTime } from "./photo/capture-time.js";
export { DEFAULT_FOLDER_PATTERN, resolveDestinationDir } from "./photo/destination.js";
export { OrganizeError } from "./photo/errors.js";
export { organizeFile } from "./photo/organize.js";
export { processFile, sweepSource } from "./photo/process.js";
export { FileQueue } from "./photo/queue.js";
export { watchSource } from "./photo/watch.js";
export { ConfigError, loadConfig, toSortSettings } from "./config/config.js";
export { createEventLogger } from "./logging/event-log.js";
export type * from "./photo/types.js";
export type { SorterConfig, SorterConfigInput } from "./config/config.js";
