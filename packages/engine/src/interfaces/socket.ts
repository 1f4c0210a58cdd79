/**
 * Abstract Socket Interfaces
 *
 * Decouple the server engine from the runtime's socket API so sessions can
 * run against real Node sockets or in-process pairs.
 */

export interface ITcpSocket {
  /**
   * Write data to the remote peer. Resolves once the data has been accepted
   * without backpressure; rejects if the socket is closed or fails.
   */
  send(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /**
   * Register a callback for the peer finishing its side (FIN). The socket
   * may still be written to until it is closed.
   */
  onEnd(cb: () => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the connection. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;
}

export interface ITcpServer {
  /** Start listening on the specified port and optional host. */
  listen(port: number, host?: string, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  /** Register a callback for incoming connections. */
  on(event: "connection", cb: (socket: unknown) => void): void;

  /** Register a callback for server errors. */
  on(event: "error", cb: (err: Error) => void): void;

  /** Close the server. */
  close(callback?: () => void): void;
}

export interface ISocketFactory {
  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a native socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;

  /** Close a native socket that could not be wrapped. */
  discardTcpSocket(socket: unknown): void;
}
