// ── Error Types ──

export type ErrorKind = "usage" | "resource" | "engine";

export abstract class MachineControlError extends Error {
  abstract readonly kind: ErrorKind;
  readonly exitCode = 1;
}

// Bad, missing or conflicting arguments
export class UsageError extends MachineControlError {
  readonly kind = "usage";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// File, socket, bind or address problems
export class ResourceError extends MachineControlError {
  readonly kind = "resource";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResourceError";
  }
}

export class EngineError extends MachineControlError {
  readonly kind = "engine";

  constructor(message: string) {
    super(message);
    this.name = "EngineError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// "trouble binding: address already in use (EADDRINUSE)"
export function describeSystemError(context: string, err: unknown): string {
  const code = err instanceof Error && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
  const message = errorMessage(err);
  return code && !message.includes(code)
    ? `${context}: ${message} (${code})`
    : `${context}: ${message}`;
}
