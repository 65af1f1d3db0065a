export interface CallOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

export class DeadlineExceededError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} deadline exceeded after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export class RunAbortedError extends Error {
  constructor(message = "Run aborted") {
    super(message);
    this.name = "RunAbortedError";
  }
}

/**
 * Runs `task` with its own abort signal, bounded by `timeoutMs` and linked to the
 * run-level `parentSignal`. Rejects with DeadlineExceededError on expiry and with
 * RunAbortedError when the parent aborts, whether or not the task honors its signal.
 */
export const withDeadline = async <T>(
  label: string,
  timeoutMs: number,
  parentSignal: AbortSignal | undefined,
  task: (options: CallOptions) => Promise<T>,
): Promise<T> => {
  if (parentSignal?.aborted) {
    throw new RunAbortedError();
  }
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
    onParentAbort = () => {
      const error = new RunAbortedError();
      controller.abort(error);
      reject(error);
    };
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });
  });

  try {
    return await Promise.race([task({ signal: controller.signal, timeoutMs }), interrupted]);
  } catch (error) {
    // a task that honors its signal rejects with the abort reason we set
    if (controller.signal.aborted && controller.signal.reason instanceof Error) {
      throw controller.signal.reason;
    }
    throw error;
  } finally {
    clearTimeout(timer);
    if (onParentAbort) parentSignal?.removeEventListener("abort", onParentAbort);
  }
};
