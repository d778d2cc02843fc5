import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Logger } from "../observability/logger";
import type { AdapterName } from "./types";

export type AdapterFailureReason = "failure" | "timeout" | "invalid-output";

export class AdapterError extends Error {
  constructor(
    readonly adapter: AdapterName,
    readonly reason: AdapterFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AdapterError";
  }
}

export type AdapterOutcome<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: AdapterError };

export interface AdapterPoolOptions {
  concurrency: number;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Shared by every session of one engine. At most `concurrency` adapter calls
 * run at once; the rest wait in FIFO order.
 */
export class AdapterPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly options: AdapterPoolOptions) {}

  async invoke<T extends TSchema>(
    adapter: AdapterName,
    schema: T,
    call: (signal: AbortSignal) => Promise<unknown>,
  ): Promise<AdapterOutcome<Static<T>>> {
    await this.acquire();
    const startedAt = Date.now();
    try {
      const value = await this.withTimeout(adapter, call);
      if (!Value.Check(schema, value)) {
        const first = Value.Errors(schema, value).First();
        const detail = first ? `${first.path || "/"} ${first.message}` : "";
        return {
          ok: false,
          error: new AdapterError(
            adapter,
            "invalid-output",
            `${adapter} returned invalid output ${detail}`.trim(),
          ),
        };
      }
      return { ok: true, value, durationMs: Date.now() - startedAt };
    } catch (error) {
      const adapterError =
        error instanceof AdapterError
          ? error
          : new AdapterError(
              adapter,
              "failure",
              `${adapter} failed: ${error instanceof Error ? error.message : String(error)}`,
              { cause: error },
            );
      this.options.logger.warn(
        { adapter, reason: adapterError.reason },
        adapterError.message,
      );
      return { ok: false, error: adapterError };
    } finally {
      this.release();
    }
  }

  stats(): { active: number; queued: number; concurrency: number } {
    return {
      active: this.active,
      queued: this.queue.length,
      concurrency: this.options.concurrency,
    };
  }

  private async withTimeout(
    adapter: AdapterName,
    call: (signal: AbortSignal) => Promise<unknown>,
  ): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new AdapterError(
            adapter,
            "timeout",
            `${adapter} timed out after ${this.options.timeoutMs}ms`,
          ),
        );
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([
        Promise.resolve().then(() => call(controller.signal)),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.options.concurrency) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active -= 1;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}
