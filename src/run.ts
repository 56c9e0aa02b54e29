// ── Front end: options → configuration → engine → one ingress driver ──

import { resolveProfile } from "./config/profile.js";
import { AckEngine } from "./engine/ack-engine.js";
import type { MachineEngine } from "./engine/types.js";
import { MachineControlError, UsageError } from "./errors.js";
import { runFileIngress } from "./ingress/file.js";
import { runServerIngress, type ServerIngressOptions } from "./ingress/server.js";
import { consoleReporter, type Reporter } from "./log.js";
import { parseCommandLine, type ParseSettings } from "./options.js";
import type { HardwareProfile } from "./types.js";

export interface RunDependencies {
  engine?: MachineEngine;
  reporter?: Reporter;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  writeOut?: ParseSettings["writeOut"];
  writeErr?: ParseSettings["writeErr"];
  onListening?: ServerIngressOptions["onListening"];
}

/**
 * Runs the whole front end for `args` and resolves with the process exit
 * code. The engine is shut down on every path after it was initialized.
 */
export async function run(args: string[], deps: RunDependencies = {}): Promise<number> {
  const reporter = deps.reporter ?? consoleReporter;

  let profile: HardwareProfile;
  try {
    profile = resolveProfile(deps.env);
  } catch (err) {
    if (err instanceof UsageError) {
      reporter.error(err.message);
      return err.exitCode;
    }
    throw err;
  }

  const parsed = parseCommandLine(args, {
    profile,
    writeOut: deps.writeOut,
    writeErr: deps.writeErr,
  });
  if (!parsed.ok) return parsed.exitCode;

  const { config, target } = parsed.options;
  const engine = deps.engine ?? new AckEngine(reporter);

  const init = await engine.initialize(config);
  if (!init.ok) {
    reporter.error(`Engine initialization failed: ${init.message}`);
    return 1;
  }

  try {
    const status = target.mode === "file"
      ? await runFileIngress(engine, {
        path: target.path,
        repeat: target.repeat,
        signal: deps.signal,
      })
      : await runServerIngress(engine, {
        port: target.port,
        bindAddress: target.bindAddress,
        reporter,
        signal: deps.signal,
        onListening: deps.onListening,
      });
    return status === 0 ? 0 : 1;
  } catch (err) {
    if (err instanceof MachineControlError) {
      reporter.error(err.message);
      return err.exitCode;
    }
    throw err;
  } finally {
    await engine.shutdown();
  }
}
