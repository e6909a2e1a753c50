// Accept loop: one independent handler task per TCP connection
import { createServer, type Server, type Socket } from "node:net";
import { LineConnection } from "../src/shared/connection.js";
import { ListenError } from "../src/shared/errors.js";
import { silentLogger, type Logger } from "../src/shared/logger.js";

export type ConnectionHandler = (connection: LineConnection) => void | Promise<void>;

export interface ListenerOptions {
  logger?: Logger;
  /** Refuse connections past this many live ones; 0 means no cap. */
  maxConnections?: number;
}

export interface ListenOptions {
  signal?: AbortSignal;
  host?: string;
  /** Called once the port is bound. */
  onListening?: (port: number) => void;
}

export class ConnectionListener {
  private server: Server | null = null;
  private readonly live = new Set<LineConnection>();
  private readonly logger: Logger;
  private readonly maxConnections: number;

  constructor(options: ListenerOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.maxConnections = options.maxConnections ?? 0;
  }

  get connectionCount(): number {
    return this.live.size;
  }

  /** Port actually bound; useful after listening on port 0. */
  port(): number | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  /**
   * Bind `port` and hand every accepted connection to `onAccept` on its own
   * task. The connection is disconnected once the handler settles. Resolves
   * after `signal` aborts and the server has closed; rejects with a
   * ListenError when the port cannot be bound.
   */
  listen(port: number, onAccept: ConnectionHandler, options: ListenOptions = {}): Promise<void> {
    if (this.server) return Promise.reject(new ListenError(port, new Error("already listening")));
    const { signal, host, onListening } = options;

    return new Promise((resolve, reject) => {
      const server = createServer((socket) => this.accept(socket, onAccept));
      this.server = server;
      let bound = false;

      server.on("error", (err) => {
        if (!bound) {
          this.server = null;
          this.logger.error({ err, port }, "failed to start listener");
          reject(new ListenError(port, err));
          return;
        }
        this.logger.warn({ err }, "accept failed; still listening");
      });

      server.on("close", () => {
        this.server = null;
        this.logger.info({ event: "listener_closed", port }, "listener closed");
        resolve();
      });

      const stop = (): void => {
        server.close();
        for (const connection of this.live) connection.disconnect();
        this.live.clear();
      };

      if (signal?.aborted) {
        this.server = null;
        resolve();
        return;
      }
      signal?.addEventListener("abort", stop, { once: true });

      server.listen({ port, host }, () => {
        bound = true;
        const boundPort = this.port() ?? port;
        this.logger.info({ event: "listening", port: boundPort }, `listening on :${boundPort}`);
        onListening?.(boundPort);
      });
    });
  }

  private accept(socket: Socket, onAccept: ConnectionHandler): void {
    if (this.maxConnections > 0 && this.live.size >= this.maxConnections) {
      this.logger.warn({ event: "connection_refused", remote: socket.remoteAddress }, "connection cap reached");
      socket.destroy();
      return;
    }
    const connection = LineConnection.fromSocket(socket, { logger: this.logger });
    this.live.add(connection);
    this.logger.info({ event: "client_connected", conn: connection.id, remote: connection.remoteAddress }, "client connected");
    // Never awaited here: a slow handler must not hold up the next accept.
    setImmediate(() => {
      void this.run(connection, onAccept);
    });
  }

  private async run(connection: LineConnection, onAccept: ConnectionHandler): Promise<void> {
    try {
      await LineConnection.use(connection, onAccept);
    } catch (err) {
      this.logger.error({ err, conn: connection.id }, "connection handler failed");
    } finally {
      this.live.delete(connection);
      this.logger.info({ event: "client_disconnected", conn: connection.id }, "client disconnected");
    }
  }
}
