export type Verdict = "sharp" | "blurry" | "unanalyzed";

/**
 * Decoded pixel data for one file. `gray` is row-major, one intensity per pixel
 * (a Uint8Array when decoded from a file); `rgb` is interleaved 8-bit R,G,B when
 * colour channels were decoded.
 */
export type ImageSample = {
  width: number;
  height: number;
  gray: ArrayLike<number>;
  rgb?: Uint8Array;
};

export type DecodeFailureKind = "raw" | "empty" | "unrecognized" | "corrupt";

export type DecodeFailure = {
  kind: DecodeFailureKind;
  reason: string;
};

export type DecodeResult =
  | { ok: true; sample: ImageSample }
  | { ok: false; failure: DecodeFailure };

export type BlurThresholds = {
  blur_threshold: number; // T_base
  bouquet_threshold: number; // T_bouquet, applied when the floral ratio is high
  bouquet_fraction: number; // F_bouquet
};

export type ClassificationResult = {
  verdict: Verdict;
  variance: number | null; // null when the file could not be decoded
  floral_ratio: number | null; // null when not computed
  bouquet: boolean;
  threshold: number | null;
  decode_failure?: DecodeFailure;
};

export type CaptureTime = {
  date: Date;
  source: "exif" | "mtime";
};

export type OrganizeParams = {
  src: string;
  baseDir: string;
  verdict: Verdict;
  captureTime: Date;
  folderPattern: string;
};

export type OrganizeResult = {
  dest_path: string;
  disambiguator: number; // 0 = original name was free
};

export type SortSettings = BlurThresholds & {
  dest_dir: string;
  folder_pattern: string;
};

export type FileStatus = "moved" | "skipped" | "error";

export type FileOutcome = {
  src_path: string;
  status: FileStatus;
  verdict?: Verdict;
  dest_path?: string;
  error?: string;
};

// Events emitted per processed file; the event log turns them into log lines.
export type SortEvent =
  | { type: "file.detected"; src_path: string }
  | { type: "file.skipped"; src_path: string; reason: string }
  | {
      type: "file.classified";
      src_path: string;
      verdict: Verdict;
      variance: number | null;
      floral_ratio: number | null;
      bouquet: boolean;
      threshold: number | null;
      reason?: string;
      failure_kind?: DecodeFailureKind;
    }
  | { type: "capture_time.fallback"; src_path: string; date: string }
  | {
      type: "file.moved";
      src_path: string;
      dest_path: string;
      verdict: Verdict;
      elapsed_ms: number;
    }
  | { type: "file.error"; src_path: string; error: string }
  | { type: "sweep.start"; source_dir: string }
  | { type: "sweep.done"; file_count: number; moved_count: number; error_count: number }
  | { type: "watch.start"; source_dir: string }
  | { type: "watch.stop"; source_dir: string };

export type OnEvent = (event: SortEvent) => void;
