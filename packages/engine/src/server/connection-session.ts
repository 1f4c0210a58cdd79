import {
  emptyRequest,
  HttpRequestParseError,
  parseRequest,
} from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import { SocketReader } from "../http/socket-reader.js";
import type { HttpRequest } from "../http/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { DEFAULT_ROUTES, type RouteContext, route, type RouteTable } from "./router.js";

export type SessionState =
  | "awaiting-request"
  | "parsing"
  | "dispatching"
  | "responding"
  | "closed";

export interface ConnectionSessionOptions {
  socket: ITcpSocket;
  context: RouteContext;
  routes?: RouteTable;
  /** Max bytes per socket read; also the size of the reused read buffer. */
  readBufferSize: number;
  /** Per-read idle deadline. Unset: wait as long as the peer stays connected. */
  readTimeoutMs?: number;
  /** Skip the per-request info line. */
  quiet?: boolean;
  logger: Logger;
}

interface ParsedFrame {
  request: HttpRequest;
  /** The stream position is unknown after this frame; stop reading. */
  mustClose: boolean;
}

/**
 * One accepted connection, from its first byte to its close. Requests are
 * handled strictly one after another: read, parse, route, respond, and
 * then either wait for the next request or close.
 *
 * However the loop ends, the socket is closed exactly once.
 */
export class ConnectionSession {
  readonly label: string;

  private currentState: SessionState = "awaiting-request";
  private readonly socket: ITcpSocket;
  private readonly reader: SocketReader;
  private readonly buffer: Uint8Array;
  private readonly routes: RouteTable;
  private readonly logger: Logger;
  private closing = false;
  private released = false;
  private running: Promise<void> | null = null;

  constructor(private readonly options: ConnectionSessionOptions) {
    this.socket = options.socket;
    this.reader = new SocketReader(options.socket, {
      timeoutMs: options.readTimeoutMs,
    });
    this.buffer = new Uint8Array(options.readBufferSize);
    this.routes = options.routes ?? DEFAULT_ROUTES;
    this.logger = options.logger;
    this.label = `${options.socket.remoteAddress ?? "?"}:${options.socket.remotePort ?? "?"}`;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Start the loop, or return the already running one. Never rejects. */
  run(): Promise<void> {
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  /** Close the connection from outside; a pending read ends the loop. */
  abort(): void {
    this.release();
  }

  private async loop(): Promise<void> {
    try {
      while (!this.released) {
        this.transition("awaiting-request");
        const bytesRead = await this.reader.readInto(this.buffer);
        if (bytesRead <= 0) {
          this.logEndOfInput();
          break;
        }

        this.transition("parsing");
        const frame = await this.parse(this.buffer.subarray(0, bytesRead));

        this.transition("dispatching");
        const { request } = frame;
        this.closing =
          frame.mustClose || request.headers.get("connection") === "close";
        if (!this.options.quiet) {
          this.logger.info(`${request.method} ${request.path} - ${this.label}`);
        }
        const response = await route(request, this.options.context, this.routes);

        this.transition("responding");
        try {
          await sendResponse(this.socket, response, this.closing);
        } catch (err) {
          this.logger.debug(`Write to ${this.label} failed:`, err);
          break;
        }

        if (this.closing) {
          break;
        }
        this.buffer.fill(0);
      }
    } catch (err) {
      this.logger.error(`Session ${this.label} failed:`, err);
    } finally {
      this.release();
      this.transition("closed");
    }
  }

  private async parse(initial: Uint8Array): Promise<ParsedFrame> {
    try {
      const request = await parseRequest(initial, () =>
        this.reader.read(this.options.readBufferSize),
      );
      if (request.method === "" && request.path === "") {
        this.logger.debug(`Empty request frame from ${this.label}`);
      }
      return { request, mustClose: false };
    } catch (err) {
      if (!(err instanceof HttpRequestParseError)) {
        throw err;
      }
      this.logger.debug(`Bad frame from ${this.label}: ${err.message}`);
      return { request: emptyRequest(), mustClose: true };
    }
  }

  private logEndOfInput(): void {
    if (this.reader.error) {
      this.logger.debug(`Read from ${this.label} failed:`, this.reader.error);
    } else if (this.reader.didTimeOut) {
      this.logger.debug(`${this.label} idle past the read deadline`);
    }
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    this.socket.close();
  }

  private transition(next: SessionState): void {
    if (this.currentState === next) return;
    this.logger.debug(`${this.label}: ${this.currentState} -> ${next}`);
    this.currentState = next;
  }
}
