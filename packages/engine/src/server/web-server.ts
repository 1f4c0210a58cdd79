import type { ServerConfig } from "../config/server-config.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { ISocketFactory, ITcpServer } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { ConnectionSession } from "./connection-session.js";
import type { RouteContext, RouteTable } from "./router.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  routes?: RouteTable;
}

export type WebServerEvents = {
  listening: [port: number];
  "session:open": [session: ConnectionSession];
  "session:close": [session: ConnectionSession];
  close: [];
  error: [err: Error];
};

/**
 * Accepts connections and runs one independent session per connection.
 * Sessions are tracked so `stop()` can close them and wait until every one
 * has finished.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: Readonly<ServerConfig>;
  private logger: Logger;
  private routes: RouteTable | undefined;
  private context: RouteContext;
  private tcpServer: ITcpServer | null = null;
  private sessions = new Map<ConnectionSession, Promise<void>>();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = Object.freeze({ ...options.config });
    this.logger = options.logger ?? basicLogger();
    this.routes = options.routes;
    this.context = Object.freeze({
      baseDir: this.config.directory,
      fs: options.fileSystem,
      logger: this.logger,
    });
  }

  /** Number of connections currently being served. */
  get activeSessions(): number {
    return this.sessions.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        this.handleConnection(rawSocket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.logger.info(`Listening on port ${port}`);
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  /** Stop accepting, close every open connection and wait for the sessions. */
  async stop(): Promise<void> {
    const server = this.tcpServer;
    this.tcpServer = null;

    const closed = server
      ? new Promise<void>((resolve) => server.close(() => resolve()))
      : Promise.resolve();

    for (const session of this.sessions.keys()) {
      session.abort();
    }

    await Promise.all([closed, ...this.sessions.values()]);
    this.emit("close");
  }

  private handleConnection(rawSocket: unknown): void {
    let session: ConnectionSession;
    try {
      session = new ConnectionSession({
        socket: this.socketFactory.wrapTcpSocket(rawSocket),
        context: this.context,
        routes: this.routes,
        readBufferSize: this.config.readBufferSize,
        readTimeoutMs: this.config.readTimeoutMs,
        quiet: this.config.quiet,
        logger: this.logger,
      });
    } catch (err) {
      this.logger.error("Failed to accept connection:", err);
      this.socketFactory.discardTcpSocket(rawSocket);
      return;
    }

    const finished = session.run().finally(() => {
      this.sessions.delete(session);
      this.emit("session:close", session);
    });
    this.sessions.set(session, finished);
    this.emit("session:open", session);
  }
}
