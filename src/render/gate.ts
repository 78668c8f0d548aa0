/**
 * Render guards: single-flight serialization, per-call timeout and retries.
 */

import { RendererError, RenderTimeoutError, errorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/log.js";
import { silentLogger } from "../shared/log.js";
import { abortReason } from "./process.js";
import type { Renderer } from "./types.js";

/** Runs at most one task at a time, in call order. */
export class SingleFlightGate {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Call `task` with a signal that aborts after `timeoutMs` (reason:
 * RenderTimeoutError) or when `parent` aborts.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw abortReason(parent);

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let onAbort: () => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(abortReason(controller.signal));
    controller.signal.addEventListener("abort", onAbort, { once: true });
  });
  const timer = timeoutMs > 0
    ? setTimeout(() => controller.abort(new RenderTimeoutError(timeoutMs)), timeoutMs)
    : undefined;

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    if (timer) clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
    controller.signal.removeEventListener("abort", onAbort);
  }
}

export interface RenderRunnerOptions {
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
  logger?: Logger;
}

/**
 * Wraps a Renderer with the gate (unless it is reentrant), the per-call
 * timeout and the retry loop. A timed-out attempt is not retried.
 */
export class RenderRunner {
  private readonly gate = new SingleFlightGate();
  private readonly logger: Logger;

  constructor(
    readonly renderer: Renderer,
    private readonly opts: RenderRunnerOptions,
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  render(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string> {
    const attempt = () => this.renderWithRetries(inputPath, outDir, signal);
    return this.renderer.reentrant ? attempt() : this.gate.run(attempt);
  }

  private async renderWithRetries(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string> {
    const attempts = Math.max(0, this.opts.retries) + 1;
    let lastError: unknown;
    for (let i = 1; i <= attempts; i++) {
      try {
        return await withTimeout(
          (s) => this.renderer.render(inputPath, outDir, s),
          this.opts.timeoutMs,
          signal,
        );
      } catch (err) {
        lastError = err;
        if (signal?.aborted) throw err;
        // The timeout bounds the whole row, not each attempt
        if (err instanceof RenderTimeoutError) {
          this.logger.warn("RENDER", `${this.renderer.name} timed out; not retrying`);
          throw err;
        }
        this.logger.warn("RENDER", `Attempt ${i}/${attempts} with ${this.renderer.name} failed: ${errorMessage(err)}`);
        if (i < attempts && this.opts.retryDelayMs) await delay(this.opts.retryDelayMs * 2 ** (i - 1));
      }
    }
    throw lastError instanceof Error ? lastError : new RendererError(errorMessage(lastError));
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
