import process from "node:process";
import { EntraTokenAcquirer } from "../auth/EntraTokenAcquirer.js";
import type { TokenAcquirer } from "../auth/TokenAcquirer.js";
import type { EndpointConfig, RunSettings } from "../config/Config.js";
import { ConfigError } from "../config/ConfigErrors.js";
import { loadEndpointConfig, loadRunSettings } from "../config/ConfigLoader.js";
import type { ApiInvoker } from "../http/ApiInvoker.js";
import { FetchApiInvoker } from "../http/FetchApiInvoker.js";
import { ConsoleReporter, type LineSink } from "../reporting/ConsoleReporter.js";
import { EndpointTester } from "../runtime/EndpointTester.js";
import { RunOrchestrator } from "../runtime/RunOrchestrator.js";

export const RUN_USAGE =
  "Usage: authprobe [run] [--config <path>] [--verbose] [--json]\n" +
  "                 [--auth-timeout-ms <ms>] [--request-timeout-ms <ms>] [--authority-host <url>]";

export interface RunCommandDeps {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  write?: LineSink;
  writeError?: LineSink;
  tokenAcquirer?: TokenAcquirer;
  apiInvoker?: ApiInvoker;
}

const writeStderr: LineSink = (line) => {
  // eslint-disable-next-line no-console
  console.error(line);
};

const parseMsArg = (flag: string, value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${flag}: expected number.\n${RUN_USAGE}`);
  }
  return parsed;
};

export const parseRunArgs = (argv: string[]): Partial<RunSettings> => {
  const parsed: Partial<RunSettings> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--verbose") {
      parsed.verbose = true;
      continue;
    }
    if (arg === "--json") {
      parsed.json = true;
      continue;
    }
    if (next === undefined || next.startsWith("--")) {
      throw new Error(`${arg.startsWith("--") ? `Missing value for ${arg}` : `Unexpected argument: ${arg}`}\n${RUN_USAGE}`);
    }
    if (arg === "--config") {
      parsed.configPath = next;
    } else if (arg === "--auth-timeout-ms") {
      parsed.authTimeoutMs = parseMsArg(arg, next);
    } else if (arg === "--request-timeout-ms") {
      parsed.requestTimeoutMs = parseMsArg(arg, next);
    } else if (arg === "--authority-host") {
      parsed.authorityHost = next;
    } else {
      throw new Error(`Unknown option: ${arg}\n${RUN_USAGE}`);
    }
    i += 1;
  }
  return parsed;
};

export class RunCommand {
  /** Runs every configured endpoint and returns the process exit status. */
  static async execute(argv: string[], deps: RunCommandDeps = {}): Promise<number> {
    const settings = loadRunSettings({ env: deps.env, cli: parseRunArgs(argv) });
    const writeError = deps.writeError ?? writeStderr;
    const reporter = new ConsoleReporter(deps.write);

    let config: EndpointConfig;
    try {
      config = await loadEndpointConfig(settings.configPath);
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      writeError(`Failed to load configuration: ${error.message}`);
      return 1;
    }

    const tester = new EndpointTester(
      deps.tokenAcquirer ?? new EntraTokenAcquirer({ authorityHost: settings.authorityHost }),
      deps.apiInvoker ?? new FetchApiInvoker(),
    );
    const orchestrator = new RunOrchestrator(tester, {
      authTimeoutMs: settings.authTimeoutMs,
      requestTimeoutMs: settings.requestTimeoutMs,
      verbose: settings.verbose,
      signal: deps.signal,
      observer: settings.json ? undefined : reporter,
    });

    if (!settings.json) reporter.printHeader(config.endpoints.length);
    const report = await orchestrator.run(config.endpoints);
    if (settings.json) {
      reporter.printJson(report);
    } else {
      reporter.printSummary(report.summary);
    }
    return report.hasFailures ? 1 : 0;
  }

  static async run(argv: string[]): Promise<void> {
    const controller = new AbortController();
    const onSignal = (): void => controller.abort();
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
    try {
      process.exitCode = await RunCommand.execute(argv, { signal: controller.signal });
    } finally {
      process.removeListener("SIGINT", onSignal);
      process.removeListener("SIGTERM", onSignal);
    }
  }
}
