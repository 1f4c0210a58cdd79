import { concat, indexOfSequence, toBinaryString } from "../utils/buffer.js";
import { HeaderMap } from "./headers.js";
import type { HttpRequest } from "./types.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const HEADER_SEPARATOR = ": ";
// ASCII whitespace only: the latin1 decode maps byte 0xA0 to a char that \s matches.
const REQUEST_LINE_SPACE = /[ \t\v\f\r]+/;

/**
 * Pulls the next chunk of bytes from the connection. Resolves `null` once the
 * peer has closed, the read failed or a configured deadline passed.
 */
export type ReadMore = () => Promise<Uint8Array | null>;

export interface HttpRequestHead {
  method: string;
  path: string;
  version: string;
  headers: HeaderMap;
  contentLength: number;
}

export type HttpRequestParseErrorCode = "INVALID_CONTENT_LENGTH";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

/** What a frame without a header terminator parses to. Routes to 404. */
export function emptyRequest(): HttpRequest {
  return {
    method: "",
    path: "",
    version: "",
    headers: new HeaderMap(),
    body: new Uint8Array(0),
  };
}

/**
 * Parse the header block (everything before the blank line). Bytes are
 * decoded one char per byte so the path and header values keep whatever the
 * client sent.
 */
export function parseRequestHead(headerBytes: Uint8Array): HttpRequestHead {
  const lines = toBinaryString(headerBytes).split("\n");

  const [method = "", path = "", version = ""] = (lines[0] ?? "")
    .split(REQUEST_LINE_SPACE)
    .filter((token) => token !== "");

  const headers = new HeaderMap();
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].endsWith("\r") ? lines[i].slice(0, -1) : lines[i];
    const at = line.indexOf(HEADER_SEPARATOR);
    if (at === -1) continue;
    headers.set(line.slice(0, at), line.slice(at + HEADER_SEPARATOR.length));
  }

  return {
    method,
    path,
    version,
    headers,
    contentLength: parseContentLength(headers.get("content-length")),
  };
}

function parseContentLength(value: string | undefined): number {
  if (value === undefined) {
    return 0;
  }

  const digits = /^[ \t]*(\d+)[ \t]*$/.exec(value)?.[1];
  const length = Number(digits);
  if (digits === undefined || !Number.isSafeInteger(length)) {
    throw new HttpRequestParseError(
      "INVALID_CONTENT_LENGTH",
      `Invalid Content-Length: ${value}`,
    );
  }
  return length;
}

/**
 * Complete a body that may have arrived only partly with the headers. Keeps
 * calling `readMore` until `contentLength` bytes are in hand or the
 * connection runs dry, in which case the short body is returned as is.
 * Anything past `contentLength` is dropped.
 */
export async function readBody(
  seed: Uint8Array,
  contentLength: number,
  readMore: ReadMore,
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [seed];
  let received = seed.length;

  while (received < contentLength) {
    const chunk = await readMore();
    if (chunk === null) break;
    chunks.push(chunk);
    received += chunk.length;
  }

  const body = concat(chunks);
  return body.length > contentLength ? body.slice(0, contentLength) : body;
}

/**
 * Parse one request out of the bytes of a single read, pulling more bytes
 * through `readMore` only for a body the first read did not fully carry.
 *
 * A first read without a blank line after the headers yields the empty
 * request straight away; headers split across reads are not reassembled.
 */
export async function parseRequest(
  initial: Uint8Array,
  readMore: ReadMore,
): Promise<HttpRequest> {
  const separatorIndex = indexOfSequence(initial, CRLF_CRLF);
  if (separatorIndex === -1) {
    return emptyRequest();
  }

  const head = parseRequestHead(initial.subarray(0, separatorIndex));
  const body = await readBody(
    initial.subarray(separatorIndex + CRLF_CRLF.length),
    head.contentLength,
    readMore,
  );

  return {
    method: head.method,
    path: head.path,
    version: head.version,
    headers: head.headers,
    body,
  };
}
