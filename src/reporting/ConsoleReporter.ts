import type { EndpointDefinition } from "../config/Config.js";
import type { EndpointTestEvent } from "../runtime/EndpointTester.js";
import type { RunObserver } from "../runtime/RunOrchestrator.js";
import { percentage, type RunReport, type RunSummary } from "../runtime/RunSummary.js";
import type { TestOutcome } from "../runtime/TestOutcome.js";

export type LineSink = (line: string) => void;

const RULE_WIDTH = 80;

const defaultSink: LineSink = (line) => {
  // eslint-disable-next-line no-console
  console.log(line);
};

export const formatDuration = (durationMs: number): string =>
  durationMs < 1000 ? `${durationMs}ms` : `${(durationMs / 1000).toFixed(2)}s`;

const padLabel = (label: string, width: number): string => label.padEnd(width, " ");

export class ConsoleReporter implements RunObserver {
  private write: LineSink;

  constructor(sink: LineSink = defaultSink) {
    this.write = sink;
  }

  printHeader(endpointCount: number): void {
    this.write(`Loaded configuration with ${endpointCount} endpoint(s)`);
    this.write("=".repeat(RULE_WIDTH));
  }

  onEndpointStart(endpoint: EndpointDefinition, index: number, total: number): void {
    this.write("");
    this.write(`[${index + 1}/${total}] Testing: ${endpoint.name}`);
    this.write(`    URL: ${endpoint.url}`);
    this.write(`    Method: ${endpoint.method}`);
  }

  onEndpointEvent(_endpoint: EndpointDefinition, event: EndpointTestEvent): void {
    switch (event.type) {
      case "auth_started":
        this.write("    → Authenticating...");
        break;
      case "auth_succeeded":
        this.write("    ✓ Authentication successful");
        break;
      case "request_started":
        this.write("    → Making API request...");
        break;
      case "request_completed":
        this.write(`    ✓ Request completed (Status: ${event.statusCode})`);
        break;
      case "response_body":
        this.write(`    Response body: ${event.body}`);
        break;
    }
  }

  onEndpointComplete(_endpoint: EndpointDefinition, outcome: TestOutcome): void {
    const duration = formatDuration(outcome.durationMs);
    if (outcome.overallSucceeded) {
      this.write(`    ✓ PASS - All checks passed (Duration: ${duration})`);
      return;
    }
    this.write(`    ✗ FAIL - ${outcome.errorMessage} (Duration: ${duration})`);
    this.write(`      • Authentication: ${outcome.authSucceeded ? "PASSED" : "FAILED"}`);
    if (outcome.connectSucceeded) {
      this.write("      • Connectivity: PASSED");
      this.write(`      • Response Status: FAILED (Status Code: ${outcome.statusCode})`);
    } else {
      this.write("      • Connectivity: FAILED");
    }
  }

  printSummary(summary: RunSummary): void {
    const passRate = percentage(summary.passed, summary.total).toFixed(1);
    const failRate = percentage(summary.failed, summary.total).toFixed(1);
    this.write("");
    this.write("=".repeat(RULE_WIDTH));
    this.write("SUMMARY");
    this.write("-".repeat(RULE_WIDTH));
    this.write(`${padLabel("Total Endpoints:", 27)}${summary.total}`);
    this.write(`${padLabel("Passed:", 27)}${summary.passed} (${passRate}%)`);
    this.write(`${padLabel("Failed:", 27)}${summary.failed} (${failRate}%)`);
    this.write("");
    this.write(`  • ${padLabel("Authentication Failures:", 26)}${summary.authFailures}`);
    this.write(`  • ${padLabel("Connectivity Failures:", 26)}${summary.connectFailures}`);
    this.write(`  • ${padLabel("Response Failures:", 26)}${summary.responseFailures}`);
    this.write("=".repeat(RULE_WIDTH));
  }

  printJson(report: RunReport): void {
    this.write(JSON.stringify(report, null, 2));
  }
}
