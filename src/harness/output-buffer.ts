import { EventEmitter } from "node:events";
import type { Readable } from "node:stream";

/**
 * Accumulates everything a child's stdout emits so it can be searched later.
 */
export class OutputBuffer {
  private buffer = "";
  private ended = false;
  private readonly changes = new EventEmitter();

  constructor(stream: Readable) {
    stream.setEncoding("utf-8");
    stream.on("data", (chunk: string) => {
      this.buffer += chunk;
      this.changes.emit("change");
    });
    stream.once("end", () => this.markEnded());
    stream.once("close", () => this.markEnded());
  }

  text(): string {
    return this.buffer;
  }

  /**
   * Resolve once `marker` has appeared in the output.
   */
  waitFor(marker: string, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error(`timed out after ${timeoutMs}ms waiting for "${marker}"`));
      }, timeoutMs);

      const cleanup = () => {
        clearTimeout(timer);
        this.changes.off("change", check);
      };

      const check = () => {
        if (this.buffer.includes(marker)) {
          cleanup();
          resolve();
        } else if (this.ended) {
          cleanup();
          reject(new Error(`output ended before "${marker}" appeared`));
        }
      };

      this.changes.on("change", check);
      check();
    });
  }

  private markEnded(): void {
    if (this.ended) return;
    this.ended = true;
    this.changes.emit("change");
  }
}
