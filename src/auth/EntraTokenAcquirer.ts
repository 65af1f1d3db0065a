import { DEFAULT_AUTHORITY_HOST } from "../config/Config.js";
import { createDebugLog, type DebugSink } from "../runtime/DebugLog.js";
import type { CallOptions } from "../runtime/Deadline.js";
import { TokenAcquisitionError, type TokenAcquirer, type TokenRequest } from "./TokenAcquirer.js";

type TokenEndpointBody = Record<string, unknown>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const INPUT_FIELDS: Array<keyof TokenRequest> = ["clientId", "clientSecret", "tenantId", "scope"];

const normalizeAuthorityHost = (value?: string): string => (value ?? DEFAULT_AUTHORITY_HOST).replace(/\/+$/, "");

const parseTokenBody = (raw: string): TokenEndpointBody | undefined => {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
};

const describeRejection = (status: number, body: TokenEndpointBody | undefined, raw: string): string => {
  const code = typeof body?.error === "string" ? body.error : undefined;
  const description = typeof body?.error_description === "string" ? body.error_description.split("\n")[0] : undefined;
  if (code) {
    return `identity provider rejected the request (${status} ${code})${description ? `: ${description}` : ""}`;
  }
  const snippet = raw.trim().slice(0, 200);
  return `identity provider rejected the request (${status})${snippet ? `: ${snippet}` : ""}`;
};

/**
 * Client-credentials token acquisition against a Microsoft Entra ID (v2.0) token endpoint.
 * Every call performs a fresh request; nothing is cached between endpoints.
 */
export class EntraTokenAcquirer implements TokenAcquirer {
  private authorityHost: string;
  private debug: DebugSink;

  constructor(options: { authorityHost?: string; debug?: DebugSink } = {}) {
    this.authorityHost = normalizeAuthorityHost(options.authorityHost);
    this.debug = options.debug ?? createDebugLog();
  }

  tokenEndpoint(tenantId: string): string {
    return `${this.authorityHost}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;
  }

  async acquireToken(request: TokenRequest, options: CallOptions): Promise<string> {
    for (const field of INPUT_FIELDS) {
      if (!request[field]) {
        throw new TokenAcquisitionError("invalid_input", `${field} is required`);
      }
    }

    const endpoint = this.tokenEndpoint(request.tenantId);
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: request.clientId,
      client_secret: request.clientSecret,
      scope: request.scope,
    });

    let response: Response;
    let raw: string;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          accept: "application/json",
        },
        body: form.toString(),
        signal: options.signal,
      });
      raw = await response.text();
    } catch (error) {
      if (options.signal.aborted) throw options.signal.reason;
      const reason = error instanceof Error ? error.message : String(error);
      this.debug(`token request to ${endpoint} failed: ${reason}`);
      throw new TokenAcquisitionError("network", `failed to acquire token: ${reason}`, { cause: error });
    }
    this.debug(`token request to ${endpoint} -> ${response.status}`);

    const body = parseTokenBody(raw);
    if (!response.ok) {
      throw new TokenAcquisitionError("rejected", `failed to acquire token: ${describeRejection(response.status, body, raw)}`, {
        status: response.status,
      });
    }
    if (!body) {
      throw new TokenAcquisitionError("malformed_response", "failed to acquire token: token response was not JSON", {
        status: response.status,
      });
    }
    if (typeof body.access_token !== "string" || !body.access_token) {
      throw new TokenAcquisitionError("empty_token", "received empty token", { status: response.status });
    }
    return body.access_token;
  }
}
