import { rawStatus, structured } from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { fromBinaryString } from "../utils/buffer.js";

export interface RouteContext {
  /** Prefix for /files/ paths, joined with "/" and never sanitized. */
  baseDir: string;
  fs: IFileSystem;
  logger: Logger;
}

/** Returns the part of the path after the matched portion, or null. */
export type PathMatcher = (path: string) => string | null;

export interface RouteRule {
  name: string;
  method: string;
  match: PathMatcher;
  handle(
    request: HttpRequest,
    tail: string,
    context: RouteContext,
  ): Promise<HttpResponse>;
}

export type RouteTable = readonly RouteRule[];

export function exactPath(expected: string): PathMatcher {
  return (path) => (path === expected ? "" : null);
}

export function pathPrefix(prefix: string): PathMatcher {
  return (path) => (path.startsWith(prefix) ? path.slice(prefix.length) : null);
}

export const rootRule: RouteRule = {
  name: "root",
  method: "GET",
  match: exactPath("/"),
  handle: async () => rawStatus(200),
};

export const echoRule: RouteRule = {
  name: "echo",
  method: "GET",
  match: pathPrefix("/echo/"),
  handle: async (_request, tail) =>
    structured(200, "text/plain", fromBinaryString(tail)),
};

export const userAgentRule: RouteRule = {
  name: "user-agent",
  method: "GET",
  match: exactPath("/user-agent"),
  handle: async (request) =>
    structured(
      200,
      "text/plain",
      fromBinaryString(request.headers.get("user-agent") ?? "Unknown"),
    ),
};

export const readFileRule: RouteRule = {
  name: "read-file",
  method: "GET",
  match: pathPrefix("/files/"),
  async handle(_request, name, { baseDir, fs, logger }) {
    const filePath = `${baseDir}/${name}`;
    try {
      const data = await readWholeFile(fs, filePath);
      return structured(200, "application/octet-stream", data);
    } catch (err) {
      logger.debug(`Cannot read ${filePath}:`, errorMessage(err));
      return rawStatus(404);
    }
  },
};

export const writeFileRule: RouteRule = {
  name: "write-file",
  method: "POST",
  match: pathPrefix("/files/"),
  async handle(request, name, { baseDir, fs, logger }) {
    const filePath = `${baseDir}/${name}`;
    try {
      await writeWholeFile(fs, filePath, request.body);
      return rawStatus(201);
    } catch (err) {
      logger.warn(`Cannot write ${filePath}:`, errorMessage(err));
      return rawStatus(500);
    }
  },
};

/** First match wins; anything unmatched is a 404. */
export const DEFAULT_ROUTES: RouteTable = Object.freeze([
  rootRule,
  echoRule,
  userAgentRule,
  readFileRule,
  writeFileRule,
]);

export async function route(
  request: HttpRequest,
  context: RouteContext,
  table: RouteTable = DEFAULT_ROUTES,
): Promise<HttpResponse> {
  for (const rule of table) {
    if (rule.method !== request.method) continue;
    const tail = rule.match(request.path);
    if (tail === null) continue;
    return rule.handle(request, tail, context);
  }
  return rawStatus(404);
}

async function readWholeFile(
  fs: IFileSystem,
  filePath: string,
): Promise<Uint8Array> {
  const stat = await fs.stat(filePath);
  if (!stat.isFile) {
    throw new Error(`Not a regular file: ${filePath}`);
  }

  const handle = await fs.open(filePath, "r");
  try {
    const data = new Uint8Array(stat.size);
    let position = 0;
    while (position < data.length) {
      const { bytesRead } = await handle.read(
        data,
        position,
        data.length - position,
        position,
      );
      if (bytesRead === 0) break;
      position += bytesRead;
    }
    return data.subarray(0, position);
  } finally {
    await handle.close();
  }
}

async function writeWholeFile(
  fs: IFileSystem,
  filePath: string,
  data: Uint8Array,
): Promise<void> {
  const handle = await fs.open(filePath, "w");
  try {
    let position = 0;
    while (position < data.length) {
      const { bytesWritten } = await handle.write(
        data,
        position,
        data.length - position,
        position,
      );
      if (bytesWritten === 0) {
        throw new Error(`No progress writing ${filePath}`);
      }
      position += bytesWritten;
    }
  } finally {
    await handle.close();
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
