export type TestStage = "auth" | "connect" | "response";

export interface TestOutcome {
  readonly endpointName: string;
  readonly authSucceeded: boolean;
  readonly connectSucceeded: boolean;
  readonly responseSucceeded: boolean;
  /** 0 unless the HTTP exchange completed. */
  readonly statusCode: number;
  /** Empty when every stage passed. */
  readonly errorMessage: string;
  readonly durationMs: number;
  readonly overallSucceeded: boolean;
}

export const isSuccessStatus = (statusCode: number): boolean => statusCode >= 200 && statusCode < 300;

export interface OutcomeInput {
  endpointName: string;
  /** Last stage that passed. */
  lastPassed: TestStage | "none";
  statusCode?: number;
  errorMessage?: string;
  durationMs: number;
}

export const createOutcome = (input: OutcomeInput): TestOutcome => {
  const authSucceeded = input.lastPassed !== "none";
  const connectSucceeded = input.lastPassed === "connect" || input.lastPassed === "response";
  const responseSucceeded = input.lastPassed === "response";
  return Object.freeze({
    endpointName: input.endpointName,
    authSucceeded,
    connectSucceeded,
    responseSucceeded,
    statusCode: connectSucceeded ? input.statusCode ?? 0 : 0,
    errorMessage: responseSucceeded ? "" : input.errorMessage ?? "",
    durationMs: input.durationMs,
    overallSucceeded: authSucceeded && connectSucceeded && responseSucceeded,
  });
};

/** The earliest stage that did not pass, or undefined for a passing outcome. */
export const failedStage = (outcome: TestOutcome): TestStage | undefined => {
  if (outcome.overallSucceeded) return undefined;
  if (!outcome.authSucceeded) return "auth";
  if (!outcome.connectSucceeded) return "connect";
  return "response";
};
