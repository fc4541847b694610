import { logger } from "../logger";
import { BackendQueryError, describeError } from "./errors";

export type DeadlineOptions = {
  backend: string;
  label: string;
  timeoutMs: number;
};

const log = logger.child({ component: "warehouse.timeout" });

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs`. A late settlement of
 * the operation after the deadline is logged and otherwise ignored.
 */
export const withDeadline = <T>(
  options: DeadlineOptions,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      settled = true;
      controller.abort();
      reject(
        new BackendQueryError(`${options.label} timed out after ${options.timeoutMs}ms`, {
          backend: options.backend,
          code: "timeout"
        })
      );
    }, options.timeoutMs);

    void Promise.resolve()
      .then(() => operation(controller.signal))
      .then(
        (value) => {
          clearTimeout(timer);
          if (!settled) {
            settled = true;
            resolve(value);
          }
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (!settled) {
            settled = true;
            reject(error);
            return;
          }

          log.debug(
            { backend: options.backend, label: options.label, error: describeError(error) },
            "operation failed after its deadline"
          );
        }
      );
  });
};
