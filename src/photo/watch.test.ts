import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { FileQueue } from "./queue.js";
import { watchSource } from "./watch.js";

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("watchSource", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "focus-sort-watch-test-"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("queues new image files once they settle and stops on abort", async () => {
    const seen: string[] = [];
    const queue = new FileQueue(async (filePath) => {
      seen.push(filePath);
    });
    const controller = new AbortController();

    const watching = watchSource(queue, {
      sourceDir: tmpDir,
      settleMs: 50,
      recursive: false,
      signal: controller.signal,
    });
    await tick(100);

    await fs.writeFile(path.join(tmpDir, "IMG_0100.jpg"), "part one");
    await fs.appendFile(path.join(tmpDir, "IMG_0100.jpg"), " and two");
    await fs.writeFile(path.join(tmpDir, "notes.txt"), "ignored");
    await fs.writeFile(path.join(tmpDir, ".hidden.jpg"), "ignored");

    await vi.waitFor(
      () => {
        expect(seen).toEqual([path.join(tmpDir, "IMG_0100.jpg")]);
      },
      { timeout: 5000, interval: 25 },
    );

    controller.abort();
    await expect(watching).resolves.toBeUndefined();
    await queue.idle();
    expect(seen).toEqual([path.join(tmpDir, "IMG_0100.jpg")]);
  });

  it("ignores files that vanish before settling", async () => {
    const seen: string[] = [];
    const queue = new FileQueue(async (filePath) => {
      seen.push(filePath);
    });
    const controller = new AbortController();
    const dir = await fs.mkdtemp(path.join(tmpDir, "vanish-"));

    const watching = watchSource(queue, {
      sourceDir: dir,
      settleMs: 50,
      recursive: false,
      signal: controller.signal,
    });
    await tick(100);

    const temp = path.join(dir, "upload.jpg");
    await fs.writeFile(temp, "partial");
    await fs.rm(temp);
    await tick(200);

    controller.abort();
    await watching;
    expect(seen).toEqual([]);
  });

  it("resolves straight away when the signal is already aborted", async () => {
    const queue = new FileQueue(async () => undefined);
    const controller = new AbortController();
    controller.abort();
    await expect(
      watchSource(queue, { sourceDir: tmpDir, settleMs: 10, signal: controller.signal }),
    ).resolves.toBeUndefined();
  });
});
