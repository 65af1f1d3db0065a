import type { CallOptions } from "../runtime/Deadline.js";

export interface TokenRequest {
  clientId: string;
  clientSecret: string;
  tenantId: string;
  scope: string;
}

/** Obtains a bearer token through the OAuth 2.0 client-credentials grant. */
export interface TokenAcquirer {
  acquireToken(request: TokenRequest, options: CallOptions): Promise<string>;
}

export type TokenAcquisitionErrorCode =
  | "invalid_input"
  | "rejected"
  | "malformed_response"
  | "empty_token"
  | "network";

export class TokenAcquisitionError extends Error {
  readonly code: TokenAcquisitionErrorCode;
  readonly status?: number;

  constructor(
    code: TokenAcquisitionErrorCode,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "TokenAcquisitionError";
    this.code = code;
    this.status = options.status;
  }
}
