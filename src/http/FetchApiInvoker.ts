import { createDebugLog, type DebugSink } from "../runtime/DebugLog.js";
import type { CallOptions } from "../runtime/Deadline.js";
import { ApiRequestError, type ApiInvoker, type ApiRequest, type ApiResponse } from "./ApiInvoker.js";

const parseTargetUrl = (raw: string): URL => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ApiRequestError("invalid_url", `failed to create request: invalid URL "${raw}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ApiRequestError("invalid_url", `failed to create request: unsupported protocol "${url.protocol}"`);
  }
  return url;
};

const collectHeaders = (headers: Headers): Record<string, string[]> => {
  const result: Record<string, string[]> = {};
  headers.forEach((value, key) => {
    if (key === "set-cookie") return;
    result[key] = [value];
  });
  const cookies = headers.getSetCookie();
  if (cookies.length) {
    result["set-cookie"] = cookies;
  }
  return result;
};

const describeCause = (error: unknown): string => {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
  return `${error.message}${cause}`;
};

export class FetchApiInvoker implements ApiInvoker {
  private debug: DebugSink;

  constructor(options: { debug?: DebugSink } = {}) {
    this.debug = options.debug ?? createDebugLog();
  }

  async invoke(request: ApiRequest, options: CallOptions): Promise<ApiResponse> {
    const url = parseTargetUrl(request.url);
    const headers: Record<string, string> = {
      authorization: `Bearer ${request.token}`,
    };
    if (request.body !== undefined) {
      headers["content-type"] = "application/json";
    }

    const started = Date.now();
    let response: Response;
    try {
      response = await fetch(url, {
        method: request.method,
        headers,
        body: request.body,
        signal: options.signal,
      });
    } catch (error) {
      if (options.signal.aborted) throw options.signal.reason;
      this.debug(`${request.method} ${url.toString()} failed: ${describeCause(error)}`);
      throw new ApiRequestError("network", `failed to execute request: ${describeCause(error)}`, { cause: error });
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (options.signal.aborted) throw options.signal.reason;
      throw new ApiRequestError("read_failed", `failed to read response body: ${describeCause(error)}`, {
        cause: error,
      });
    }
    this.debug(`${request.method} ${url.toString()} -> ${response.status} (${Date.now() - started}ms)`);

    return {
      statusCode: response.status,
      headers: collectHeaders(response.headers),
      body,
    };
  }
}
