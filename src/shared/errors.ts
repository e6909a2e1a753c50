// Typed failures for the transport and protocol layers

export type SnakeNetErrorCode =
  | "CONNECT_FAILED"
  | "NOT_CONNECTED"
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "MESSAGE_PARSE"
  | "HANDSHAKE_PARSE"
  | "MESSAGE_FRAMING"
  | "LISTEN_FAILED"
  | "LOCK_REENTRY"
  | "CONFIG_INVALID";

export class SnakeNetError extends Error {
  readonly code: SnakeNetErrorCode;

  constructor(code: SnakeNetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type ConnectFailureReason = "dns" | "refused" | "timeout" | "unreachable" | "aborted";

export class ConnectError extends SnakeNetError {
  readonly host: string;
  readonly port: number;
  readonly reason: ConnectFailureReason;

  constructor(host: string, port: number, reason: ConnectFailureReason, cause?: unknown) {
    super("CONNECT_FAILED", `could not connect to ${host}:${port} (${reason})`, { cause });
    this.host = host;
    this.port = port;
    this.reason = reason;
  }
}

export class NotConnectedError extends SnakeNetError {
  constructor(operation: string) {
    super("NOT_CONNECTED", `cannot ${operation}: connection is not open`);
  }
}

export class ReadError extends SnakeNetError {
  constructor(cause: unknown) {
    super("READ_FAILED", `read failed: ${errorMessage(cause)}`, { cause });
  }
}

export class WriteError extends SnakeNetError {
  constructor(cause: unknown) {
    super("WRITE_FAILED", `write failed: ${errorMessage(cause)}`, { cause });
  }
}

export class MessageParseError extends SnakeNetError {
  readonly line: string;

  constructor(line: string, detail: string, cause?: unknown) {
    super("MESSAGE_PARSE", `malformed message (${detail}): ${truncate(line)}`, { cause });
    this.line = line;
  }
}

export class HandshakeParseError extends SnakeNetError {
  readonly line: string;

  constructor(line: string) {
    super("HANDSHAKE_PARSE", `client id is not an integer: ${truncate(line)}`);
    this.line = line;
  }
}

export class MessageFramingError extends SnakeNetError {
  constructor() {
    super("MESSAGE_FRAMING", "a message must not contain line terminators");
  }
}

export class ListenError extends SnakeNetError {
  readonly port: number;

  constructor(port: number, cause: unknown) {
    super("LISTEN_FAILED", `could not listen on port ${port}: ${errorMessage(cause)}`, { cause });
    this.port = port;
  }
}

export class LockReentryError extends SnakeNetError {
  constructor() {
    super("LOCK_REENTRY", "world state lock is already held");
  }
}

export class ConfigError extends SnakeNetError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function truncate(line: string, max = 80): string {
  return line.length > max ? line.slice(0, max) + "…" : line;
}
