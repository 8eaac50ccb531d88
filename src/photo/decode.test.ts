import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { decodeImage } from "./decode.js";

describe("decodeImage", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "focus-sort-decode-test-"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeSolidPng(name: string, r: number, g: number, b: number): Promise<string> {
    const filePath = path.join(tmpDir, name);
    await sharp({
      create: { width: 6, height: 4, channels: 3, background: { r, g, b } },
    })
      .png()
      .toFile(filePath);
    return filePath;
  }

  it("decodes a PNG into grey and RGB planes", async () => {
    const filePath = await writeSolidPng("grey.png", 128, 128, 128);
    const result = await decodeImage(filePath);
    if (!result.ok) {
      throw new Error(`expected decode to succeed: ${result.failure.reason}`);
    }
    expect(result.sample.width).toBe(6);
    expect(result.sample.height).toBe(4);
    expect(result.sample.gray).toBeInstanceOf(Uint8Array);
    expect(result.sample.gray).toHaveLength(24);
    expect(result.sample.gray[0]).toBe(128);
    expect(result.sample.rgb).toHaveLength(72);
  });

  it("weights channels like standard luma", async () => {
    const filePath = await writeSolidPng("red.png", 255, 0, 0);
    const result = await decodeImage(filePath);
    if (!result.ok) {
      throw new Error(`expected decode to succeed: ${result.failure.reason}`);
    }
    // round(0.299 * 255)
    expect(result.sample.gray[0]).toBe(76);
    expect(Array.from(result.sample.rgb?.subarray(0, 3) ?? [])).toEqual([255, 0, 0]);
  });

  it("rejects RAW extensions without reading them", async () => {
    const result = await decodeImage(path.join(tmpDir, "never-written.nef"));
    expect(result).toEqual({
      ok: false,
      failure: { kind: "raw", reason: "RAW format .nef is not decoded" },
    });
  });

  it("reports empty files", async () => {
    const filePath = path.join(tmpDir, "empty.jpg");
    await fs.writeFile(filePath, Buffer.alloc(0));
    const result = await decodeImage(filePath);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.kind).toBe("empty");
  });

  it("reports unrecognized bytes", async () => {
    const filePath = path.join(tmpDir, "random.jpg");
    await fs.writeFile(filePath, Buffer.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]));
    const result = await decodeImage(filePath);
    expect(!result.ok && result.failure.kind).toBe("unrecognized");
  });

  it("reports non-image content under an image extension", async () => {
    const filePath = path.join(tmpDir, "document.jpg");
    await fs.writeFile(filePath, "%PDF-1.4\n%test document\n");
    const result = await decodeImage(filePath);
    expect(!result.ok && result.failure.kind).toBe("unrecognized");
  });

  it("reports truncated images as corrupt", async () => {
    const filePath = path.join(tmpDir, "truncated.jpg");
    await fs.writeFile(filePath, Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]));
    const result = await decodeImage(filePath);
    expect(!result.ok && result.failure.kind).toBe("corrupt");
  });

  it("rejects when the file cannot be read", async () => {
    await expect(decodeImage(path.join(tmpDir, "missing.png"))).rejects.toThrow("ENOENT");
  });
});
