import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "../logger.js";
import type { StatusStore } from "./status-store.js";

type VisitorFile = {
  visitorCount: number;
  lastUpdated: string;
};

/**
 * Durable visitor tally. The live value sits in the status store; every
 * change is written through to a small JSON file so it survives restarts.
 */
export class VisitorStore {
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly store: StatusStore,
    private readonly logger: Logger,
  ) {}

  async load(): Promise<number> {
    const count = await this.readCount();
    this.commit(count);
    return count;
  }

  get(): number {
    return this.store.read().visitorCount;
  }

  async add(count: number): Promise<number> {
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new RangeError(`Visitor increment must be a positive integer, got ${count}`);
    }
    return this.enqueue(async () => {
      const total = this.get() + count;
      await this.write(total);
      this.commit(total);
      return total;
    });
  }

  async reset(): Promise<void> {
    await this.enqueue(async () => {
      await this.write(0);
      this.commit(0);
    });
  }

  private async readCount(): Promise<number> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return 0;
      this.logger.warn({ err: error, file: this.filePath }, "Could not read visitor count, starting at 0");
      return 0;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      const value = typeof parsed === "object" && parsed !== null && "visitorCount" in parsed ? parsed.visitorCount : null;
      return typeof value === "number" && Number.isSafeInteger(value) && value >= 0 ? value : 0;
    } catch (error) {
      this.logger.warn({ err: error, file: this.filePath }, "Visitor count file is not valid JSON, starting at 0");
      return 0;
    }
  }

  // Updates run one at a time; the store only sees a count once it is on disk.
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task);
    this.pending = run.then(
      () => undefined,
      (error: unknown) => {
        this.logger.error({ err: error, file: this.filePath }, "Failed to persist visitor count");
      },
    );
    return run;
  }

  private commit(visitorCount: number): void {
    this.store.withLock((record) => {
      record.visitorCount = visitorCount;
    });
  }

  private async write(visitorCount: number): Promise<void> {
    const body: VisitorFile = { visitorCount, lastUpdated: new Date().toISOString() };
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(body, null, 2)}\n`, "utf8");
  }
}
