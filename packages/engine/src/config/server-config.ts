export interface ServerConfig {
  /** Port to listen on. Default: 4221 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' */
  host: string;
  /** Base directory for /files/. Used verbatim as a path prefix. */
  directory: string;
  /** Pending-connection queue depth handed to listen(). Default: 5 */
  backlog: number;
  /** Max bytes taken from the socket per read. Default: 4096 */
  readBufferSize: number;
  /**
   * Max idle time for a single read, in ms. When unset a session waits
   * indefinitely for the next request or for missing body bytes.
   */
  readTimeoutMs?: number;
  /** Suppress request logging. Default: false */
  quiet: boolean;
}

export function defaultConfig(directory: string): ServerConfig {
  return {
    port: 4221,
    host: "0.0.0.0",
    directory,
    backlog: 5,
    readBufferSize: 4096,
    quiet: false,
  };
}
