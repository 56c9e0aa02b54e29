// ── Acknowledging engine: answers every command line with "ok", moves nothing ──

import * as readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { EngineError, errorMessage } from "../errors.js";
import { consoleReporter, dim, type Reporter } from "../log.js";
import type { MachineConfiguration } from "../types.js";
import type { EngineInitResult, MachineEngine } from "./types.js";

// Drop ';' line comments and '( ... )' inline comments
export function stripComment(line: string): string {
  return line.replace(/\([^)]*\)/g, "").replace(/;.*$/, "").trim();
}

// Resolves once buffered responses are flushed or the output is gone
function drained(output: Writable): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      output.removeListener("drain", done);
      output.removeListener("close", done);
      output.removeListener("error", done);
      resolve();
    };
    output.on("drain", done);
    output.on("close", done);
    output.on("error", done);
  });
}

export class AckEngine implements MachineEngine {
  private config: MachineConfiguration | null = null;
  private reporter: Reporter;

  constructor(reporter: Reporter = consoleReporter) {
    this.reporter = reporter;
  }

  async initialize(config: MachineConfiguration): Promise<EngineInitResult> {
    if (this.config) {
      return { ok: false, message: "Engine already initialized" };
    }
    this.config = config;
    return { ok: true };
  }

  async process(input: Readable, output: Writable): Promise<number> {
    const config = this.config;
    if (!config) throw new EngineError("process() called before initialize()");

    let failed = false;
    let reported = false;
    const report = (what: string, err: unknown) => {
      if (reported) return;
      reported = true;
      this.reporter.error(`${what}: ${errorMessage(err)}`);
    };

    const rl = readline.createInterface({ input, crlfDelay: Infinity });
    const onOutputError = (err: Error) => {
      failed = true;
      report("Writing response", err);
      rl.close();
    };
    output.on("error", onOutputError);

    try {
      for await (const line of rl) {
        const command = stripComment(line);
        if (!command) continue;
        if (config.debugPrint) this.reporter.info(dim(command));
        if (output.destroyed || output.errored) {
          failed = true;
          break;
        }
        if (!output.write("ok\n")) {
          await drained(output);
          if (output.destroyed) {
            failed = true;
            break;
          }
        }
      }
      if (output.errored) failed = true;
    } catch (err) {
      failed = true;
      report("Reading commands", err);
    } finally {
      rl.close();
      // A failed output delivers its error event later
      if (!output.destroyed && !output.errored) output.removeListener("error", onOutputError);
    }
    return failed ? 1 : 0;
  }

  async shutdown(): Promise<void> {
    this.config = null;
  }
}
