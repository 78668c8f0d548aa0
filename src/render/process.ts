/**
 * Child process helper for office automation.
 */

import { spawn } from "child_process";
import type { SpawnOptions } from "child_process";
import { RendererError } from "../shared/errors.js";

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Run a command to completion. Resolves with the exit code and output;
 * rejects with RendererError when it cannot be started, or with the abort
 * reason when `signal` fires.
 */
export function runProcess(command: string, args: string[], opts: RunProcessOptions = {}): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    if (opts.signal?.aborted) {
      reject(abortReason(opts.signal));
      return;
    }

    const spawnOpts: SpawnOptions = { env: opts.env ?? process.env, cwd: opts.cwd, windowsHide: true };
    if (opts.signal) spawnOpts.signal = opts.signal;
    const child = spawn(command, args, spawnOpts);

    let stdout = "";
    let stderr = "";
    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      if (opts.signal?.aborted) {
        reject(abortReason(opts.signal));
      } else if (error.code === "ENOENT") {
        reject(new RendererError(`Command not found: ${command}`, { command }));
      } else {
        reject(new RendererError(`Failed to start ${command}: ${error.message}`, { command }));
      }
    });

    child.on("close", (code) => {
      if (opts.signal?.aborted) {
        reject(abortReason(opts.signal));
        return;
      }
      resolve({ code, stdout, stderr });
    });
  });
}

export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new RendererError("Render aborted");
}
