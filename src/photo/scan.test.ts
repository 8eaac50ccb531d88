import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  isInside,
  isRawExtension,
  isSupportedExtension,
  scanSourceFiles,
} from "./scan.js";

describe("extensions", () => {
  it("recognizes RAW formats case-insensitively", () => {
    expect(isRawExtension(".CR2")).toBe(true);
    expect(isRawExtension(".nef")).toBe(true);
    expect(isRawExtension(".jpg")).toBe(false);
  });

  it("accepts raster and RAW images only", () => {
    expect(isSupportedExtension(".JPG")).toBe(true);
    expect(isSupportedExtension(".tiff")).toBe(true);
    expect(isSupportedExtension(".dng")).toBe(true);
    expect(isSupportedExtension(".mov")).toBe(false);
    expect(isSupportedExtension("")).toBe(false);
  });
});

describe("isInside", () => {
  it("matches the directory itself and its descendants", () => {
    expect(isInside("/data/out", "/data/out")).toBe(true);
    expect(isInside("/data/out", "/data/out/2025-04-17/a.jpg")).toBe(true);
    expect(isInside("/data/out", "/data/outbox/a.jpg")).toBe(false);
    expect(isInside("/data/out", "/data/a.jpg")).toBe(false);
  });
});

describe("scanSourceFiles", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "focus-sort-scan-test-"));
    await fs.mkdir(path.join(tmpDir, "day2"), { recursive: true });
    await fs.mkdir(path.join(tmpDir, ".thumbs"), { recursive: true });
    await fs.mkdir(path.join(tmpDir, "out", "2025-04-17"), { recursive: true });
    await fs.writeFile(path.join(tmpDir, "IMG_002.jpg"), "jpg");
    await fs.writeFile(path.join(tmpDir, "day2", "DSC_001.NEF"), "raw-data");
    await fs.writeFile(path.join(tmpDir, "notes.txt"), "text file");
    await fs.writeFile(path.join(tmpDir, ".DS_Store"), "system file");
    await fs.writeFile(path.join(tmpDir, ".thumbs", "t.jpg"), "thumb");
    await fs.writeFile(path.join(tmpDir, "out", "2025-04-17", "done.jpg"), "sorted");
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("lists supported images sorted by relative path", async () => {
    const files = await scanSourceFiles(tmpDir, path.join(tmpDir, "out"));
    expect(files).toEqual([
      {
        rel_path: path.join("day2", "DSC_001.NEF"),
        abs_path: path.join(tmpDir, "day2", "DSC_001.NEF"),
      },
      { rel_path: "IMG_002.jpg", abs_path: path.join(tmpDir, "IMG_002.jpg") },
    ]);
  });

  it("includes the destination tree when no exclusion is given", async () => {
    const files = await scanSourceFiles(tmpDir);
    expect(files.map((f) => f.rel_path)).toContain(path.join("out", "2025-04-17", "done.jpg"));
  });
});
