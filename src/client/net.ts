// Client session: handshake, receive loop and direction commands
import { LineConnection } from "../shared/connection.js";
import { HandshakeParseError, SnakeNetError } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { decodeServerLine, encodeCommand, parseInteger, type ServerMessage } from "../shared/protocol.js";
import type { ScoreSink } from "../shared/store.js";
import type { Direction, SnakeRecord } from "../shared/types.js";
import type { WorldState } from "./state.js";

export type SessionState = "idle" | "connecting" | "handshaking" | "streaming" | "disconnected";

export interface ClientSessionOptions {
  logger?: Logger;
  connectTimeoutMs?: number;
  scores?: ScoreSink;
  onStateChange?: (state: SessionState) => void;
}

export class ClientSession {
  private status: SessionState = "idle";
  private id: number | null = null;
  private readonly connection: LineConnection;
  private readonly logger: Logger;
  private readonly scores: ScoreSink | undefined;
  private readonly onStateChange: ((state: SessionState) => void) | undefined;
  private readonly finished: Promise<void>;
  private markFinished: () => void = () => undefined;

  constructor(options: ClientSessionOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.connection = new LineConnection({ logger: this.logger, connectTimeoutMs: options.connectTimeoutMs });
    this.scores = options.scores;
    this.onStateChange = options.onStateChange;
    this.finished = new Promise((resolve) => {
      this.markFinished = resolve;
    });
  }

  get state(): SessionState {
    return this.status;
  }

  /** Id the server assigned during the handshake; null until then or if it was not a number. */
  get clientId(): number | null {
    return this.id;
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  /**
   * Connect, send the player name, read the client id and start streaming
   * into `world`. Resolves once the receive loop is running; rejects with
   * the ConnectError when the server cannot be reached.
   */
  async start(world: WorldState, host: string, port: number, playerName: string, signal?: AbortSignal): Promise<void> {
    const current = this.status;
    if (current !== "idle") {
      throw new Error(`session cannot start from state ${current}`);
    }

    this.transition("connecting");
    const result = await this.connection.connect(host, port);
    // disconnect() during the connect leaves nothing to do
    if (this.state !== "connecting") return;
    if (!result.ok) {
      this.transition("disconnected");
      this.markFinished();
      throw result.error;
    }

    this.transition("handshaking");
    try {
      // The name has to be the first line the server sees.
      await this.connection.send(playerName);
      const idLine = await this.connection.readLine();
      this.id = parseInteger(idLine);
      if (this.id === null) {
        this.logger.warn({ err: new HandshakeParseError(idLine) }, "failed to parse client id");
      } else {
        this.logger.info({ event: "handshake", clientId: this.id }, `client id ${this.id}`);
      }
    } catch (err) {
      this.disconnect();
      throw err;
    }
    // disconnect() may have run while the handshake was in flight
    if (this.status !== "handshaking") return;

    if (signal) {
      if (signal.aborted) {
        this.disconnect();
        return;
      }
      signal.addEventListener("abort", () => this.disconnect(), { once: true });
    }

    this.transition("streaming");
    void this.receiveLoop(world);
  }

  /** Settles after the session has disconnected and its leave time is recorded. */
  done(): Promise<void> {
    return this.finished;
  }

  /**
   * Best-effort direction command. Does nothing (beyond a log line) when the
   * session is not streaming.
   */
  async sendCommand(direction: Direction): Promise<void> {
    if (this.status !== "streaming" || !this.connection.isConnected()) {
      this.logger.warn({ direction, state: this.status }, "not connected; direction not sent");
      return;
    }
    try {
      await this.connection.send(encodeCommand(direction));
    } catch (err) {
      this.logger.warn({ err, direction }, "failed to send direction");
    }
  }

  disconnect(): void {
    if (this.status === "disconnected") return;
    const hadSession = this.status === "handshaking" || this.status === "streaming";
    this.connection.disconnect();
    this.transition("disconnected");
    if (!hadSession || !this.scores) {
      this.markFinished();
      return;
    }
    const scores = this.scores;
    void Promise.resolve()
      .then(() => scores.sessionEnded(new Date()))
      .catch((err: unknown) => this.logger.error({ err }, "failed to record leave time"))
      .then(() => this.markFinished());
  }

  private async receiveLoop(world: WorldState): Promise<void> {
    try {
      while (this.status === "streaming" && this.connection.isConnected()) {
        let line: string;
        try {
          line = await this.connection.readLine();
        } catch (err) {
          this.logger.error({ err }, "connection read failed");
          break;
        }
        if (line === "") continue;
        this.handleLine(world, line);
      }
    } catch (err) {
      this.logger.error({ err }, "receive loop failed");
    } finally {
      this.logger.info({ event: "stream_ended" }, "receive loop finished");
      this.disconnect();
    }
  }

  private handleLine(world: WorldState, line: string): void {
    let message: ServerMessage;
    try {
      message = decodeServerLine(line);
      world.apply(message);
    } catch (err) {
      if (!(err instanceof SnakeNetError)) {
        this.logger.error({ err }, "unexpected error applying message");
      } else {
        this.logger.warn({ err }, "dropping malformed message");
      }
      return;
    }
    if (message.kind === "snake") this.reportSnake(message.snake);
  }

  private reportSnake(snake: SnakeRecord): void {
    const scores = this.scores;
    if (!scores) return;
    // A sink that throws instead of rejecting is contained the same way.
    void Promise.resolve()
      .then(() => scores.snakeUpdated(snake.SnakeId, snake.Name, snake.Score))
      .catch((err: unknown) => this.logger.error({ err, snakeId: snake.SnakeId }, "failed to record score"));
  }

  private transition(next: SessionState): void {
    const prev = this.status;
    this.status = next;
    this.logger.debug({ event: "session_state", from: prev, to: next }, `${prev} -> ${next}`);
    this.onStateChange?.(next);
  }
}
