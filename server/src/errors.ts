export type RejectReason = 'ServerFull';

export class ProtocolError extends Error {
  constructor(message: string, readonly line?: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class CapacityExceededError extends Error {
  readonly reason: RejectReason = 'ServerFull';

  constructor(readonly capacity: number) {
    super(`Server is full (max ${capacity}).`);
    this.name = 'CapacityExceededError';
  }
}

export class ConnectionLostError extends Error {
  constructor(readonly sessionId: number, cause?: unknown) {
    super(`Connection lost for session ${sessionId}`, { cause });
    this.name = 'ConnectionLostError';
  }
}

export class SessionTimeoutError extends Error {
  constructor(readonly sessionId: number, readonly idleMs: number) {
    super(`Session ${sessionId} timed out after ${Math.round(idleMs)}ms`);
    this.name = 'SessionTimeoutError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class PartnershipError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PartnershipError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Log line for an error: name and message, then the offending line and the cause when present. */
export function formatError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  let out = `${err.name}: ${err.message}`;
  if (err instanceof ProtocolError && err.line !== undefined) out += ` [${err.line.slice(0, 200)}]`;
  if (err.cause !== undefined) out += ` (${describeError(err.cause)})`;
  return out;
}
