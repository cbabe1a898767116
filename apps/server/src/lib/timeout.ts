import { AttemptTimeoutError } from "./errors.js";

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. Once the
 * deadline passes the signal is aborted, and the returned promise rejects
 * with AttemptTimeoutError only after the task has settled, so no work from
 * a timed-out task overlaps whatever the caller does next. The task must
 * honour its signal. A `timeoutMs` of 0 disables the limit.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return task(controller.signal);
  }

  const running = task(controller.signal);
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<{ done: false }>((resolve) => {
    timer = setTimeout(() => resolve({ done: false }), timeoutMs);
  });

  let outcome: { done: true; value: T } | { done: false };
  try {
    outcome = await Promise.race([
      running.then((value) => ({ done: true as const, value })),
      deadline,
    ]);
  } finally {
    clearTimeout(timer);
  }
  if (outcome.done) {
    return outcome.value;
  }

  const error = new AttemptTimeoutError(operation, timeoutMs);
  controller.abort(error);
  // The task's own outcome is superseded by the timeout.
  await running.then(
    () => undefined,
    () => undefined,
  );
  throw error;
}
