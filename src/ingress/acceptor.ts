// ── TCP acceptor: hands out accepted sockets one at a time, in accept order ──
// At most LISTEN_BACKLOG clients wait behind the one being served.

import { createServer, type Server, type Socket } from "node:net";
import type { Duplex } from "node:stream";
import { ResourceError, describeSystemError, errorMessage } from "../errors.js";
import { consoleReporter, type Reporter } from "../log.js";
import { LISTEN_BACKLOG } from "../types.js";

export interface Connection {
  stream: Duplex;
  peer: string;
}

export interface Acceptor {
  // Resolves with null once the acceptor is closed
  accept(): Promise<Connection | null>;
  close(): Promise<void>;
}

type Waiter = {
  resolve: (connection: Connection | null) => void;
  reject: (err: Error) => void;
};

export class TcpAcceptor implements Acceptor {
  private pending: Socket[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private closed = false;

  private constructor(
    private readonly server: Server,
    private readonly reporter: Reporter
  ) {
    server.on("connection", (socket) => this.onConnection(socket));
    server.on("error", (err) => this.onServerError(err));
  }

  static async listen(
    port: number,
    host: string,
    reporter: Reporter = consoleReporter
  ): Promise<TcpAcceptor> {
    // Sockets stay paused until their turn comes; the engine may keep
    // answering after the client finished sending
    const server = createServer({ pauseOnConnect: true, allowHalfOpen: true });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new ResourceError(describeSystemError("trouble binding", err), { cause: err }));
      };
      server.once("error", onError);
      server.listen({ port, host, backlog: LISTEN_BACKLOG }, () => {
        server.removeListener("error", onError);
        resolve();
      });
    });

    return new TcpAcceptor(server, reporter);
  }

  get port(): number {
    const address = this.server.address();
    return address !== null && typeof address === "object" ? address.port : -1;
  }

  accept(): Promise<Connection | null> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.resolve(null);

    const socket = this.pending.shift();
    if (socket) return Promise.resolve(toConnection(socket));

    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      for (const socket of this.pending) socket.destroy();
      this.pending = [];
      this.takeWaiter()?.resolve(null);
    }
    if (!this.server.listening) return Promise.resolve();
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }

  private onConnection(socket: Socket): void {
    // EPIPE / ECONNRESET from a client that went away; the engine sees the
    // failed read or write on its own
    socket.on("error", (err) => {
      this.reporter.error(`Connection ${peerOf(socket)}: ${errorMessage(err)}`);
    });

    if (this.closed) {
      socket.destroy();
      return;
    }
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve(toConnection(socket));
    } else if (this.pending.length >= LISTEN_BACKLOG) {
      this.reporter.error(`Refusing connection from ${peerOf(socket)}: ${LISTEN_BACKLOG} clients already waiting`);
      socket.destroy();
    } else {
      this.pending.push(socket);
    }
  }

  private onServerError(err: Error): void {
    this.failure = new ResourceError(describeSystemError("accept", err), { cause: err });
    this.takeWaiter()?.reject(this.failure);
  }

  private takeWaiter(): Waiter | null {
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }
}

function peerOf(socket: Socket): string {
  return socket.remoteAddress ?? "unknown peer";
}

function toConnection(socket: Socket): Connection {
  return { stream: socket, peer: peerOf(socket) };
}
