import type { HeaderMap } from "./headers.js";

export interface HttpRequest {
  method: string;
  /** Request target exactly as received; never decoded or normalized. */
  path: string;
  version: string;
  headers: HeaderMap;
  body: Uint8Array;
}

export interface StructuredResponse {
  kind: "structured";
  status: HttpStatus;
  contentType: string;
  body: Uint8Array;
}

/** Pre-formatted bytes written as-is, used for status-only replies. */
export interface RawResponse {
  kind: "raw";
  bytes: Uint8Array;
}

export type HttpResponse = StructuredResponse | RawResponse;

export const STATUS_TEXT = {
  200: "OK",
  201: "Created",
  404: "Not Found",
  500: "Internal Server Error",
} as const;

export type HttpStatus = keyof typeof STATUS_TEXT;
