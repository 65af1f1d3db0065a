#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { RUN_USAGE, RunCommand } from "./cli/RunCommand.js";
import { RunAbortedError } from "./runtime/Deadline.js";

const HELP_TEXT =
  `${RUN_USAGE}\n` +
  "\n" +
  "Acquires a client-credentials token for each configured endpoint, calls it once and\n" +
  "reports authentication, connectivity and response-status results.\n" +
  "\n" +
  "Options:\n" +
  "  --config <path>            Endpoint file, JSON or YAML (default: config.json)\n" +
  "  --verbose                  Show progress for each stage\n" +
  "  --json                     Print the run report as JSON\n" +
  "  --auth-timeout-ms <ms>     Deadline for each token request (default: 30000)\n" +
  "  --request-timeout-ms <ms>  Deadline for each API request (default: 30000)\n" +
  "  --authority-host <url>     Identity provider host (default: https://login.microsoftonline.com)\n" +
  "  --help, -h                 Show help\n" +
  "  --version, -v              Show version\n";

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

export const readVersion = (): string => {
  const pkgJson = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgJson, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
  } catch {
    // fall through to the dev marker
  }
  return "dev";
};

export const runCli = async (
  argv: string[] = process.argv.slice(2),
  write: (line: string) => void = (line) => {
    // eslint-disable-next-line no-console
    console.log(line);
  },
): Promise<void> => {
  if (argv.includes("--help") || argv.includes("-h")) {
    write(HELP_TEXT);
    return;
  }

  const [command, ...rest] = argv;
  if (argv.includes("--version") || argv.includes("-v") || command === "version") {
    write(readVersion());
    return;
  }

  await RunCommand.run(command === "run" ? rest : argv);
};

export const reportCliError = (
  error: unknown,
  writeError: (line: string) => void = (line) => {
    // eslint-disable-next-line no-console
    console.error(line);
  },
): void => {
  if (error instanceof RunAbortedError) {
    writeError("Run aborted before completion.");
  } else {
    writeError(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli().catch((error: unknown) => reportCliError(error));
}
