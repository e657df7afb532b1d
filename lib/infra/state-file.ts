import fs from "node:fs/promises";
import path from "node:path";
import type { StateStore } from "@/lib/domain/ports";

/**
 * JSON document on disk, replaced with write-to-temp + rename so a reader never
 * observes a partially written file.
 */
export class JsonStateFile<T> implements StateStore<T> {
  private queue: Promise<void> = Promise.resolve();

  private sequence = 0;

  constructor(
    readonly filePath: string,
    private readonly parse: (value: unknown) => T | null,
  ) {}

  async read(): Promise<T | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
    return this.parse(JSON.parse(text));
  }

  write(state: T): Promise<void> {
    const payload = `${JSON.stringify(state, null, 2)}\n`;
    const run = this.queue.then(() => this.replace(payload));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async replace(payload: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    this.sequence += 1;
    const tmpPath = `${this.filePath}.${process.pid}.${this.sequence}.tmp`;
    await fs.writeFile(tmpPath, payload, "utf-8");
    await fs.rename(tmpPath, this.filePath);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
