import type { TokenAcquirer } from "../auth/TokenAcquirer.js";
import type { EndpointDefinition } from "../config/Config.js";
import { bodyAsString, type ApiInvoker, type ApiResponse } from "../http/ApiInvoker.js";
import { serializeRequestBody } from "../http/RequestBodyPolicy.js";
import { RunAbortedError, withDeadline } from "./Deadline.js";
import { createOutcome, isSuccessStatus, type OutcomeInput, type TestOutcome } from "./TestOutcome.js";

export type EndpointTestEvent =
  | { type: "auth_started" }
  | { type: "auth_succeeded" }
  | { type: "request_started" }
  | { type: "request_completed"; statusCode: number }
  | { type: "response_body"; body: string };

export interface EndpointTestOptions {
  signal?: AbortSignal;
  authTimeoutMs: number;
  requestTimeoutMs: number;
  verbose: boolean;
  onEvent?: (event: EndpointTestEvent) => void;
}

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const rethrowIfAborted = (error: unknown, signal: AbortSignal | undefined): void => {
  if (error instanceof RunAbortedError) throw error;
  if (signal?.aborted) throw new RunAbortedError();
};

export class EndpointTester {
  constructor(
    private tokenAcquirer: TokenAcquirer,
    private apiInvoker: ApiInvoker,
  ) {}

  /**
   * Authenticates, calls the endpoint once and classifies the status. The first failing
   * stage ends the test; run-level cancellation is re-thrown instead of recorded.
   */
  async test(endpoint: EndpointDefinition, options: EndpointTestOptions): Promise<TestOutcome> {
    const emit = (event: EndpointTestEvent): void => {
      if (options.verbose) options.onEvent?.(event);
    };
    const startedAt = Date.now();
    const finish = (input: Omit<OutcomeInput, "endpointName" | "durationMs">): TestOutcome =>
      createOutcome({ ...input, endpointName: endpoint.name, durationMs: Date.now() - startedAt });

    emit({ type: "auth_started" });
    let token: string;
    try {
      token = await withDeadline("token acquisition", options.authTimeoutMs, options.signal, (call) =>
        this.tokenAcquirer.acquireToken(
          {
            clientId: endpoint.clientId,
            clientSecret: endpoint.clientSecret,
            tenantId: endpoint.tenantId,
            scope: endpoint.scope,
          },
          call,
        ),
      );
    } catch (error) {
      rethrowIfAborted(error, options.signal);
      return finish({ lastPassed: "none", errorMessage: `Authentication failed: ${describeError(error)}` });
    }
    if (!token) {
      return finish({ lastPassed: "none", errorMessage: "Authentication failed: received empty token" });
    }
    emit({ type: "auth_succeeded" });

    emit({ type: "request_started" });
    let response: ApiResponse;
    try {
      const body = serializeRequestBody(endpoint.method, endpoint.requestBody);
      response = await withDeadline("request", options.requestTimeoutMs, options.signal, (call) =>
        this.apiInvoker.invoke({ method: endpoint.method, url: endpoint.url, token, body }, call),
      );
    } catch (error) {
      rethrowIfAborted(error, options.signal);
      return finish({ lastPassed: "auth", errorMessage: `Request failed: ${describeError(error)}` });
    }
    emit({ type: "request_completed", statusCode: response.statusCode });

    if (isSuccessStatus(response.statusCode)) {
      return finish({ lastPassed: "response", statusCode: response.statusCode });
    }
    if (response.body.length > 0) {
      emit({ type: "response_body", body: bodyAsString(response) });
    }
    return finish({
      lastPassed: "connect",
      statusCode: response.statusCode,
      errorMessage: `Unexpected status code: ${response.statusCode}`,
    });
  }
}
