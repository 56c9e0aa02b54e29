// ── Execution engine boundary ──

import type { Readable, Writable } from "node:stream";
import type { MachineConfiguration } from "../types.js";

export type EngineInitResult = { ok: true } | { ok: false; message: string };

/**
 * Everything the front end needs from the GCode execution engine.
 *
 * `process` consumes one command stream and resolves with its final status:
 * 0 when the stream was exhausted normally, anything else ends the current
 * ingress driver.
 */
export interface MachineEngine {
  initialize(config: MachineConfiguration): Promise<EngineInitResult>;
  process(input: Readable, output: Writable): Promise<number>;
  shutdown(): Promise<void>;
}
