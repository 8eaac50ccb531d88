import { errorMessage } from "./errors.js";

export type QueueHandler<T> = (filePath: string) => Promise<T>;

type Settler<T> = {
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

/**
 * Serial work queue of file paths: one handler call at a time, in arrival order.
 * A path that is already waiting is not queued a second time.
 */
export class FileQueue<T = unknown> {
  private readonly pending: string[] = [];
  // Waiting paths and the submit() callers to settle when each one has run
  private readonly waiting = new Map<string, Array<Settler<T>>>();
  private running = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handler: QueueHandler<T>,
    private readonly onError?: (filePath: string, err: unknown) => void,
  ) {}

  get size(): number {
    return this.pending.length;
  }

  get busy(): boolean {
    return this.running;
  }

  /** Returns false when the path was already waiting. */
  enqueue(filePath: string): boolean {
    if (this.waiting.has(filePath)) {
      return false;
    }
    this.add(filePath);
    this.kick();
    return true;
  }

  /**
   * Queue the path, or join its waiting entry, and resolve with the handler's
   * result. A handler failure goes to `onError` and also rejects.
   */
  submit(filePath: string): Promise<T> {
    const result = new Promise<T>((resolve, reject) => {
      this.add(filePath).push({ resolve, reject });
    });
    this.kick();
    return result;
  }

  /** Resolves once nothing is waiting or running. */
  idle(): Promise<void> {
    if (!this.running && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(() => resolve());
    });
  }

  private add(filePath: string): Array<Settler<T>> {
    let settlers = this.waiting.get(filePath);
    if (!settlers) {
      settlers = [];
      this.waiting.set(filePath, settlers);
      this.pending.push(filePath);
    }
    return settlers;
  }

  private kick(): void {
    if (!this.running) {
      this.running = true;
      void this.drain();
    }
  }

  private reportError(filePath: string, err: unknown): void {
    if (!this.onError) {
      return;
    }
    try {
      this.onError(filePath, err);
    } catch (reportErr) {
      process.stderr.write(
        `focus-sort: could not report failure of ${filePath} (${errorMessage(err)}): ` +
          `${errorMessage(reportErr)}\n`,
      );
    }
  }

  private async drain(): Promise<void> {
    try {
      let next = this.pending.shift();
      while (next !== undefined) {
        const filePath = next;
        const settlers = this.waiting.get(filePath) ?? [];
        this.waiting.delete(filePath);
        try {
          const result = await this.handler(filePath);
          for (const settler of settlers) {
            settler.resolve(result);
          }
        } catch (err) {
          this.reportError(filePath, err);
          for (const settler of settlers) {
            settler.reject(err);
          }
        }
        next = this.pending.shift();
      }
    } finally {
      this.running = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
