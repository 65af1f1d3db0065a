import type { HttpMethod, JsonObject } from "../config/Config.js";

const BODY_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(["POST", "PUT", "PATCH"]);

export class RequestBodyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RequestBodyError";
  }
}

export const shouldAttachBody = (
  method: HttpMethod,
  body: Readonly<JsonObject> | null | undefined,
): body is Readonly<JsonObject> => body !== undefined && body !== null && BODY_METHODS.has(method);

/**
 * JSON text to send for a configured body, or undefined when the method carries none.
 * GET and DELETE drop a configured body without complaint.
 */
export const serializeRequestBody = (
  method: HttpMethod,
  body: Readonly<JsonObject> | null | undefined,
): string | undefined => {
  if (!shouldAttachBody(method, body)) return undefined;
  let json: string | undefined;
  try {
    json = JSON.stringify(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RequestBodyError(`failed to serialize request body: ${reason}`, { cause: error });
  }
  if (json === undefined) {
    throw new RequestBodyError("failed to serialize request body: value has no JSON representation");
  }
  return json;
};
