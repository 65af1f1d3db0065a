import type { HttpMethod } from "../config/Config.js";
import type { CallOptions } from "../runtime/Deadline.js";

export interface ApiRequest {
  method: HttpMethod;
  url: string;
  token: string;
  /** Serialized JSON; sent with `Content-Type: application/json` when present. */
  body?: string;
}

export interface ApiResponse {
  statusCode: number;
  /**
   * Lower-cased header names. `fetch` folds repeated headers into one comma-joined
   * value, so only `set-cookie` can hold more than one entry.
   */
  headers: Record<string, string[]>;
  body: Uint8Array;
}

export interface ApiInvoker {
  invoke(request: ApiRequest, options: CallOptions): Promise<ApiResponse>;
}

export type ApiRequestErrorCode = "invalid_url" | "network" | "read_failed";

export class ApiRequestError extends Error {
  readonly code: ApiRequestErrorCode;

  constructor(code: ApiRequestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ApiRequestError";
    this.code = code;
  }
}

export const bodyAsString = (response: ApiResponse): string => new TextDecoder().decode(response.body);

export const bodyAsJson = (response: ApiResponse): unknown => {
  if (response.body.length === 0) {
    throw new Error("empty response body");
  }
  return JSON.parse(bodyAsString(response));
};
