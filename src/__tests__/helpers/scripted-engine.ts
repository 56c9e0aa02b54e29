import type { Duplex, Readable, Writable } from "node:stream";
import type { EngineInitResult, MachineEngine } from "../../engine/types.js";
import type { MachineConfiguration } from "../../types.js";

export interface ScriptedCall {
  input: Readable | Duplex;
  output: Writable | Duplex;
  received: string;
}

export interface ScriptedEngineOptions {
  // Read each input to its end before answering
  consume?: boolean;
  init?: EngineInitResult;
  // Runs inside process(), after the input was consumed
  onCall?: (index: number) => void;
}

/**
 * Engine double: records every call and answers with the next scripted
 * status (the last one repeats once the script runs out).
 */
export class ScriptedEngine implements MachineEngine {
  readonly calls: ScriptedCall[] = [];
  readonly configs: MachineConfiguration[] = [];
  shutdowns = 0;

  constructor(
    private readonly statuses: number[],
    private readonly options: ScriptedEngineOptions = {}
  ) {}

  async initialize(config: MachineConfiguration): Promise<EngineInitResult> {
    this.configs.push(config);
    return this.options.init ?? { ok: true };
  }

  async process(input: Readable, output: Writable): Promise<number> {
    const index = this.calls.length;
    const call: ScriptedCall = { input, output, received: "" };
    this.calls.push(call);

    if (this.options.consume) {
      for await (const chunk of input) {
        call.received += Buffer.isBuffer(chunk) ? chunk.toString("utf-8") : String(chunk);
      }
    }
    this.options.onCall?.(index);

    return this.statuses[Math.min(index, this.statuses.length - 1)] ?? 0;
  }

  async shutdown(): Promise<void> {
    this.shutdowns++;
  }
}
