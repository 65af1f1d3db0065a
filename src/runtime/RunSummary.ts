import { failedStage, type TestOutcome } from "./TestOutcome.js";

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  authFailures: number;
  connectFailures: number;
  responseFailures: number;
}

export interface RunReport {
  outcomes: readonly TestOutcome[];
  summary: RunSummary;
  hasFailures: boolean;
}

export const summarizeOutcomes = (outcomes: readonly TestOutcome[]): RunSummary => {
  const summary: RunSummary = {
    total: outcomes.length,
    passed: 0,
    failed: 0,
    authFailures: 0,
    connectFailures: 0,
    responseFailures: 0,
  };
  for (const outcome of outcomes) {
    const stage = failedStage(outcome);
    if (!stage) {
      summary.passed += 1;
      continue;
    }
    summary.failed += 1;
    if (stage === "auth") summary.authFailures += 1;
    else if (stage === "connect") summary.connectFailures += 1;
    else summary.responseFailures += 1;
  }
  return summary;
};

export const hasFailures = (outcomes: readonly TestOutcome[]): boolean =>
  outcomes.some((outcome) => !outcome.overallSucceeded);

export const percentage = (count: number, total: number): number => (total > 0 ? (count / total) * 100 : 0);
