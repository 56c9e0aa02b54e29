#!/usr/bin/env node

import { red } from "./log.js";
import { run } from "./run.js";
import { onStopSignals } from "./signals.js";

// ── Main ──
async function main(): Promise<void> {
  const controller = new AbortController();
  onStopSignals(controller);

  const code = await run(process.argv.slice(2), { signal: controller.signal });
  process.exit(code);
}

main().catch((err) => {
  console.error(red("✗ Fatal:", process.stderr), err instanceof Error ? err.message : String(err));
  process.exit(1);
});
