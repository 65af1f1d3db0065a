import type { EndpointDefinition } from "../config/Config.js";
import { createInvalidConfigError } from "../config/ConfigErrors.js";
import { RunAbortedError } from "./Deadline.js";
import type { EndpointTestEvent, EndpointTester } from "./EndpointTester.js";
import { hasFailures, summarizeOutcomes, type RunReport } from "./RunSummary.js";
import type { TestOutcome } from "./TestOutcome.js";

export interface RunObserver {
  onEndpointStart?(endpoint: EndpointDefinition, index: number, total: number): void;
  onEndpointEvent?(endpoint: EndpointDefinition, event: EndpointTestEvent): void;
  onEndpointComplete?(endpoint: EndpointDefinition, outcome: TestOutcome): void;
}

export interface RunOrchestratorOptions {
  authTimeoutMs: number;
  requestTimeoutMs: number;
  verbose: boolean;
  signal?: AbortSignal;
  observer?: RunObserver;
}

export class RunOrchestrator {
  constructor(
    private tester: EndpointTester,
    private options: RunOrchestratorOptions,
  ) {}

  async run(endpoints: readonly EndpointDefinition[]): Promise<RunReport> {
    if (endpoints.length === 0) {
      throw createInvalidConfigError("no endpoints defined in configuration");
    }
    const { signal, observer } = this.options;
    const outcomes: TestOutcome[] = [];

    for (const [index, endpoint] of endpoints.entries()) {
      if (signal?.aborted) throw new RunAbortedError();
      observer?.onEndpointStart?.(endpoint, index, endpoints.length);
      const outcome = await this.tester.test(endpoint, {
        signal,
        authTimeoutMs: this.options.authTimeoutMs,
        requestTimeoutMs: this.options.requestTimeoutMs,
        verbose: this.options.verbose,
        onEvent: (event) => observer?.onEndpointEvent?.(endpoint, event),
      });
      outcomes.push(outcome);
      observer?.onEndpointComplete?.(endpoint, outcome);
    }

    return {
      outcomes,
      summary: summarizeOutcomes(outcomes),
      hasFailures: hasFailures(outcomes),
    };
  }
}
