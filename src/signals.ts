// ── Stop signals: the first one aborts the running driver, a second one exits ──

export const STOP_SIGNALS = ["SIGINT", "SIGTERM"] as const;
export type StopSignal = (typeof STOP_SIGNALS)[number];

export interface SignalSource {
  on(event: StopSignal, listener: () => void): unknown;
  removeListener(event: StopSignal, listener: () => void): unknown;
}

export interface StopSignalOptions {
  source?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Aborts `controller` on SIGINT or SIGTERM. A signal that arrives after the
 * abort calls `exit(1)` without waiting for the driver. Returns a function
 * that removes the handlers.
 */
export function onStopSignals(
  controller: AbortController,
  { source = process, exit = (code) => process.exit(code) }: StopSignalOptions = {}
): () => void {
  const stop = () => {
    if (controller.signal.aborted) exit(1);
    else controller.abort();
  };
  for (const signal of STOP_SIGNALS) source.on(signal, stop);
  return () => {
    for (const signal of STOP_SIGNALS) source.removeListener(signal, stop);
  };
}
