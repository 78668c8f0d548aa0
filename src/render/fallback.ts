import { RendererError, RenderTimeoutError, errorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/log.js";
import { silentLogger } from "../shared/log.js";
import type { Renderer } from "./types.js";

/**
 * Tries `primary`, and on a renderer failure (not a timeout or an abort)
 * renders the same input with `secondary`.
 */
export class FallbackRenderer implements Renderer {
  readonly name: string;
  readonly reentrant: boolean;

  constructor(
    private readonly primary: Renderer,
    private readonly secondary: Renderer,
    private readonly logger: Logger = silentLogger,
  ) {
    this.name = `${primary.name}>${secondary.name}`;
    this.reentrant = primary.reentrant && secondary.reentrant;
  }

  async render(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.primary.render(inputPath, outDir, signal);
    } catch (err) {
      if (signal?.aborted || err instanceof RenderTimeoutError || !(err instanceof RendererError)) throw err;
      this.logger.warn("RENDER", `${this.primary.name} failed (${errorMessage(err)}); trying ${this.secondary.name}`);
      return this.secondary.render(inputPath, outDir, signal);
    }
  }
}
