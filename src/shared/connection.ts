// Line-framed TCP connection shared by the server and the client
import { createConnection, type Socket } from "node:net";
import { customAlphabet } from "nanoid";
import {
  ConnectError,
  MessageFramingError,
  NotConnectedError,
  ReadError,
  WriteError,
  type ConnectFailureReason,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

const nanoid = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 10);

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export type ConnectResult = { ok: true } | { ok: false; error: ConnectError };

export interface LineConnectionOptions {
  logger?: Logger;
  connectTimeoutMs?: number;
}

interface PendingRead {
  resolve(line: string): void;
  reject(err: ReadError): void;
}

/**
 * Splits a socket's UTF-8 text into lines. Lines that arrive before anyone
 * asks for them are queued; reads that arrive first wait.
 */
class LineReader {
  private buffered = "";
  private readonly lines: string[] = [];
  private readonly pending: PendingRead[] = [];
  private failure: ReadError | null = null;
  private ended = false;

  constructor(private readonly socket: Socket) {
    socket.setEncoding("utf8");
    socket.on("data", this.onData);
    socket.on("end", this.onEnd);
    socket.on("close", this.onEnd);
    socket.on("error", this.onError);
  }

  get finished(): boolean {
    return this.ended || this.failure !== null;
  }

  read(): Promise<string> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve("");
    return new Promise((resolve, reject) => this.pending.push({ resolve, reject }));
  }

  close(): void {
    this.socket.off("data", this.onData);
    this.socket.off("end", this.onEnd);
    this.socket.off("close", this.onEnd);
    this.socket.off("error", this.onError);
    this.lines.length = 0;
    this.buffered = "";
    this.finish();
  }

  private onData = (chunk: string | Buffer): void => {
    this.buffered += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    let nl = this.buffered.indexOf("\n");
    while (nl !== -1) {
      const raw = this.buffered.slice(0, nl);
      this.buffered = this.buffered.slice(nl + 1);
      this.deliver(raw.endsWith("\r") ? raw.slice(0, -1) : raw);
      nl = this.buffered.indexOf("\n");
    }
  };

  private onEnd = (): void => {
    if (this.ended) return;
    // An unterminated tail is still a line.
    if (this.buffered.length > 0) {
      this.deliver(this.buffered);
      this.buffered = "";
    }
    this.finish();
  };

  private onError = (err: Error): void => {
    if (this.finished) return;
    this.failure = new ReadError(err);
    for (const read of this.pending.splice(0)) read.reject(this.failure);
  };

  private deliver(line: string): void {
    const read = this.pending.shift();
    if (read) read.resolve(line);
    else this.lines.push(line);
  }

  private finish(): void {
    this.ended = true;
    for (const read of this.pending.splice(0)) read.resolve("");
  }
}

function failureReason(err: unknown): ConnectFailureReason {
  const code = err instanceof Error && "code" in err ? err.code : undefined;
  switch (code) {
    case "ENOTFOUND":
    case "EAI_AGAIN":
    case "EAI_NONAME":
    case "EAI_FAIL":
      return "dns";
    case "ECONNREFUSED":
      return "refused";
    case "ETIMEDOUT":
      return "timeout";
    default:
      return "unreachable";
  }
}

/**
 * One TCP socket carrying newline-terminated UTF-8 messages.
 *
 * Either connect out with {@link LineConnection.connect} or wrap a socket a
 * server accepted with {@link LineConnection.fromSocket}.
 */
export class LineConnection {
  readonly id = nanoid();
  private socket: Socket | null = null;
  private reader: LineReader | null = null;
  // Set while a connect is in flight so disconnect() can abandon it.
  private cancelConnect: (() => void) | null = null;
  private readonly logger: Logger;
  private readonly connectTimeoutMs: number;

  constructor(options: LineConnectionOptions = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ conn: this.id });
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  }

  static fromSocket(socket: Socket, options: LineConnectionOptions = {}): LineConnection {
    const connection = new LineConnection(options);
    connection.attach(socket);
    return connection;
  }

  /** Runs `fn` with the connection and disconnects it however `fn` ends. */
  static async use<T>(connection: LineConnection, fn: (connection: LineConnection) => T | Promise<T>): Promise<T> {
    try {
      return await fn(connection);
    } finally {
      connection.disconnect();
    }
  }

  get remoteAddress(): string | undefined {
    const socket = this.socket;
    if (!socket?.remoteAddress) return undefined;
    return `${socket.remoteAddress}:${socket.remotePort ?? 0}`;
  }

  isConnected(): boolean {
    const { socket, reader } = this;
    if (!socket || !reader) return false;
    return !socket.destroyed && socket.readyState === "open" && !reader.finished;
  }

  connect(host: string, port: number): Promise<ConnectResult> {
    this.disconnect();
    return new Promise((resolve) => {
      const socket = createConnection({ host, port });
      let settled = false;

      const fail = (reason: ConnectFailureReason, cause?: unknown): void => {
        if (settled) return;
        settled = true;
        this.cancelConnect = null;
        clearTimeout(timer);
        socket.destroy();
        const error = new ConnectError(host, port, reason, cause);
        if (reason === "aborted") this.logger.debug({ event: "connect_aborted", host, port }, error.message);
        else this.logger.error({ event: "connect_failed", host, port, reason }, error.message);
        resolve({ ok: false, error });
      };

      const timer = setTimeout(() => fail("timeout"), this.connectTimeoutMs);
      socket.on("error", (err) => fail(failureReason(err), err));
      this.cancelConnect = () => fail("aborted");
      socket.once("connect", () => {
        if (settled) return;
        settled = true;
        this.cancelConnect = null;
        clearTimeout(timer);
        this.attach(socket);
        this.logger.info({ event: "connected", host, port }, `connected to ${host}:${port}`);
        resolve({ ok: true });
      });
    });
  }

  /**
   * Write one message followed by a newline. Resolves once the bytes are
   * handed to the OS; calls leave the socket in the order they were made.
   */
  async send(line: string): Promise<void> {
    if (line.includes("\n") || line.includes("\r")) throw new MessageFramingError();
    const socket = this.socket;
    if (!socket || !this.isConnected()) {
      this.logger.warn({ event: "send_while_disconnected" }, "attempted to send while disconnected");
      throw new NotConnectedError("send");
    }
    await new Promise<void>((resolve, reject) => {
      socket.write(line + "\n", "utf8", (err) => (err ? reject(new WriteError(err)) : resolve()));
    });
    this.logger.trace({ line }, "sent");
  }

  /**
   * Next line without its terminator. Resolves "" for an empty line and at
   * end of stream; check {@link isConnected} to tell them apart.
   */
  async readLine(): Promise<string> {
    const reader = this.reader;
    if (!reader) throw new NotConnectedError("read");
    const line = await reader.read();
    if (line !== "") this.logger.trace({ line }, "received");
    return line;
  }

  disconnect(): void {
    const cancel = this.cancelConnect;
    this.cancelConnect = null;
    cancel?.();
    const { socket, reader } = this;
    this.socket = null;
    this.reader = null;
    if (!socket) return;
    this.release("reader", () => reader?.close());
    this.release("writer", () => socket.end());
    this.release("socket", () => socket.destroy());
    this.logger.debug({ event: "disconnected" }, "connection closed");
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    // Keeps late socket errors (resets after close) from going unhandled.
    socket.on("error", (err) => this.logger.debug({ err }, "socket error"));
    if (socket.destroyed || socket.readyState !== "open") return;
    socket.setNoDelay(true);
    this.reader = new LineReader(socket);
  }

  private release(part: "reader" | "writer" | "socket", close: () => void): void {
    try {
      close();
    } catch (err) {
      this.logger.warn({ err, part }, `failed to close ${part}`);
    }
  }
}
