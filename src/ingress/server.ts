// ── TCP ingress: serve GCode connections one after another ──

import { isIPv4 } from "node:net";
import type { MachineEngine } from "../engine/types.js";
import { ResourceError } from "../errors.js";
import { consoleReporter, type Reporter } from "../log.js";
import { DEFAULT_BIND_ADDRESS } from "../types.js";
import { TcpAcceptor, type Acceptor, type Connection } from "./acceptor.js";

export type ServerState =
  | "listening"
  | "awaiting-connection"
  | "serving"
  | "terminated";

// A single failing session ends the server
export function nextServerState(status: number): ServerState {
  return status === 0 ? "awaiting-connection" : "terminated";
}

export interface ServeOptions {
  reporter?: Reporter;
  signal?: AbortSignal;
  onStateChange?: (state: ServerState) => void;
}

export interface ServerIngressOptions extends ServeOptions {
  port: number;
  bindAddress?: string;
  // Called once the socket is bound, before the first accept
  onListening?: (acceptor: TcpAcceptor) => void;
}

export function validateListenAddress(port: number, bindAddress: string): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ResourceError(`Invalid port ${port}`);
  }
  if (!isIPv4(bindAddress)) {
    throw new ResourceError(`Invalid bind IP address ${bindAddress}`);
  }
}

// Same stream for commands and responses; a clean session is ended, anything else torn down
async function serveOne(engine: MachineEngine, connection: Connection): Promise<number> {
  let clean = false;
  try {
    const status = await engine.process(connection.stream, connection.stream);
    clean = status === 0;
    return status;
  } finally {
    if (clean) connection.stream.end();
    else connection.stream.destroy();
  }
}

/**
 * Accepts connections from `acceptor` and passes each, as both command
 * input and response output, to the engine. The next connection is only
 * taken after the engine finished the current one with status 0.
 *
 * Resolves with the last non-zero status, or 0 when `signal` stopped the
 * server. The acceptor is closed on every way out.
 */
export async function serveConnections(
  engine: MachineEngine,
  acceptor: Acceptor,
  { reporter = consoleReporter, signal, onStateChange }: ServeOptions = {}
): Promise<number> {
  let state: ServerState = "awaiting-connection";
  let status = 0;
  let active: Connection | null = null;

  const onAbort = () => {
    active?.stream.destroy(new Error("server stopped"));
    acceptor.close().catch((err: unknown) => reporter.error(String(err)));
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    onStateChange?.(state);
    while (state === "awaiting-connection" && !signal?.aborted) {
      const connection = await acceptor.accept();
      if (!connection) break;

      state = "serving";
      onStateChange?.(state);
      active = connection;
      reporter.info(`Accepting new connection from ${connection.peer}`);
      try {
        status = await serveOne(engine, connection);
      } finally {
        active = null;
      }
      reporter.info(`Connection to ${connection.peer} closed.`);

      if (signal?.aborted) break;
      state = nextServerState(status);
      if (state !== "terminated") onStateChange?.(state);
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    await acceptor.close();
    onStateChange?.("terminated");
  }

  if (signal?.aborted) return 0;
  reporter.error(`Last stream status == ${status}. Exiting`);
  return status;
}

export async function runServerIngress(
  engine: MachineEngine,
  {
    port,
    bindAddress = DEFAULT_BIND_ADDRESS,
    reporter = consoleReporter,
    signal,
    onStateChange,
    onListening,
  }: ServerIngressOptions
): Promise<number> {
  validateListenAddress(port, bindAddress);

  const acceptor = await TcpAcceptor.listen(port, bindAddress, reporter);
  onStateChange?.("listening");
  reporter.info(`Listening on ${bindAddress}:${acceptor.port}`);
  onListening?.(acceptor);

  return serveConnections(engine, acceptor, { reporter, signal, onStateChange });
}
