// ── File ingress: play a GCode file, optionally forever ──

import { open, type FileHandle } from "node:fs/promises";
import type { Writable } from "node:stream";
import type { MachineEngine } from "../engine/types.js";
import { ResourceError, describeSystemError } from "../errors.js";

export interface FileIngressOptions {
  path: string;
  repeat: boolean;
  // Where the engine writes responses and errors
  output?: Writable;
  signal?: AbortSignal;
}

/**
 * Runs the file through the engine once, or until a pass fails when
 * `repeat` is set. Resolves with the failing status, or 0 after a single
 * successful pass or when `signal` stops the loop.
 */
export async function runFileIngress(
  engine: MachineEngine,
  { path, repeat, output = process.stderr, signal }: FileIngressOptions
): Promise<number> {
  do {
    if (signal?.aborted) return 0;

    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (err) {
      throw new ResourceError(describeSystemError(`opening ${path}`, err), { cause: err });
    }

    const input = handle.createReadStream();
    const stop = () => input.destroy(new Error("playback stopped"));
    signal?.addEventListener("abort", stop, { once: true });
    try {
      const status = await engine.process(input, output);
      if (signal?.aborted) return 0;
      if (status !== 0) return status;
    } finally {
      signal?.removeEventListener("abort", stop);
      input.destroy();
    }
  } while (repeat);

  return 0;
}
