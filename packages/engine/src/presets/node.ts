import { NodeFileSystem, NodeSocketFactory } from "../adapters/node/index.js";
import { defaultConfig, type ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import type { RouteTable } from "../server/router.js";
import { WebServer } from "../server/web-server.js";

export interface NodeServerOptions {
  /** Overrides on top of `defaultConfig(config.directory)`. */
  config: Partial<ServerConfig> & Pick<ServerConfig, "directory">;
  logger?: Logger;
  routes?: RouteTable;
}

/** A `WebServer` on `node:net` sockets serving files from the real disk. */
export function createNodeServer(options: NodeServerOptions): WebServer {
  const config: ServerConfig = {
    ...defaultConfig(options.config.directory),
    ...options.config,
  };
  return new WebServer({
    socketFactory: new NodeSocketFactory(config.backlog),
    fileSystem: new NodeFileSystem(),
    config,
    logger: options.logger,
    routes: options.routes,
  });
}
