import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  constructor(private readonly socket: net.Socket) {}

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  send(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    // The write callback fires once the bytes are handed to the OS, so a
    // close() right after cannot discard them.
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (data: Buffer) => {
      cb(new Uint8Array(data));
    });
  }

  onEnd(cb: () => void): void {
    this.socket.on("end", cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  close(): void {
    this.socket.destroy();
  }
}

export class NodeTcpServer implements ITcpServer {
  // Half-open: a peer that sends FIN after its request still gets the reply.
  private server = net.createServer({ allowHalfOpen: true });

  constructor(private readonly backlog?: number) {}

  listen(port: number, host?: string, callback?: () => void): void {
    this.server.listen({ port, host, backlog: this.backlog }, callback);
  }

  address(): { port: number } | null {
    const addr = this.server.address();
    if (addr && typeof addr === "object" && "port" in addr) {
      return { port: addr.port };
    }
    return null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    if (event === "connection") {
      this.server.on("connection", cb as (socket: net.Socket) => void);
      return;
    }
    this.server.on("error", cb as (err: Error) => void);
  }

  close(callback?: () => void): void {
    this.server.close(callback);
  }
}

export class NodeSocketFactory implements ISocketFactory {
  constructor(private readonly backlog?: number) {}

  createTcpServer(): ITcpServer {
    return new NodeTcpServer(this.backlog);
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof net.Socket)) {
      throw new Error("Expected a Node net.Socket");
    }
    return new NodeTcpSocket(socket);
  }

  discardTcpSocket(socket: unknown): void {
    if (socket instanceof net.Socket) {
      socket.destroy();
    }
  }
}
