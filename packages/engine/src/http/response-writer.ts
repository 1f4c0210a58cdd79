import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import {
  type HttpResponse,
  type HttpStatus,
  type RawResponse,
  STATUS_TEXT,
  type StructuredResponse,
} from "./types.js";

/** `HTTP/1.1 <code> <text>` with nothing after the blank line. */
export function rawStatus(status: HttpStatus): RawResponse {
  return {
    kind: "raw",
    bytes: fromString(`HTTP/1.1 ${status} ${STATUS_TEXT[status]}\r\n\r\n`),
  };
}

export function structured(
  status: HttpStatus,
  contentType: string,
  body: Uint8Array,
): StructuredResponse {
  return { kind: "structured", status, contentType, body };
}

/**
 * Serialize a structured response. Content-Length is always computed from
 * the body, and Connection reflects whether the session closes after this
 * reply.
 */
export function formatStructured(
  response: StructuredResponse,
  closing: boolean,
): Uint8Array {
  const lines: string[] = [
    `HTTP/1.1 ${response.status} ${STATUS_TEXT[response.status]}`,
    `Content-Type: ${response.contentType}`,
    `Content-Length: ${response.body.length}`,
    `Connection: ${closing ? "close" : "keep-alive"}`,
  ];
  lines.push("", ""); // \r\n\r\n
  return concat([fromString(lines.join("\r\n")), response.body]);
}

export function sendStructured(
  socket: ITcpSocket,
  response: StructuredResponse,
  closing: boolean,
): Promise<void> {
  return socket.send(formatStructured(response, closing));
}

export function sendRaw(socket: ITcpSocket, bytes: Uint8Array): Promise<void> {
  return socket.send(bytes);
}

/**
 * Send either kind of response. A rejected write means the connection is
 * no longer usable; callers end the session.
 */
export function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
  closing: boolean,
): Promise<void> {
  if (response.kind === "raw") {
    return sendRaw(socket, response.bytes);
  }
  return sendStructured(socket, response, closing);
}
