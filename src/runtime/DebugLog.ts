const DEBUG_ENV = "AUTHPROBE_DEBUG";
const DEBUG_PREFIX = "[authprobe]";

export type DebugSink = (line: string) => void;

export const isDebugEnabled = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const raw = env[DEBUG_ENV];
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return !["0", "false", "off", "no"].includes(normalized);
};

const writeStderr: DebugSink = (line) => {
  process.stderr.write(line.endsWith("\n") ? line : `${line}\n`);
};

/**
 * Returns a line emitter for transport diagnostics, or a no-op when AUTHPROBE_DEBUG is unset.
 * Callers pass URLs and status codes only; credentials and tokens never go through here.
 */
export const createDebugLog = (options: { env?: NodeJS.ProcessEnv; sink?: DebugSink } = {}): DebugSink => {
  if (!isDebugEnabled(options.env)) return () => undefined;
  const sink = options.sink ?? writeStderr;
  return (line) => sink(`${DEBUG_PREFIX} ${line}`);
};
