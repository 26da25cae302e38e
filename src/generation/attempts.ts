import { BackendCallFailedError } from "../errors";
import type { Logger } from "../logging/logger";
import type { BackendName } from "../types/contracts";
import { countWords } from "../utils";

/**
 * Runs `call` up to `maxRetries + 1` times with no delay between attempts.
 * Throws the last failure, annotated with the attempt count.
 */
export async function runAttempts(
  backend: BackendName,
  maxRetries: number,
  logger: Logger,
  call: (attempt: number) => Promise<string>
): Promise<string> {
  const total = maxRetries + 1;
  let lastFailure: BackendCallFailedError | undefined;

  for (let attempt = 1; attempt <= total; attempt++) {
    try {
      const text = (await call(attempt)).trim();
      logger.info("Generation attempt succeeded", {
        backend,
        attempt,
        of: total,
        chars: text.length,
        words: countWords(text)
      });
      return text;
    } catch (error) {
      lastFailure = BackendCallFailedError.fromApiError(backend, error);
      logger.warn("Generation attempt failed", {
        backend,
        attempt,
        of: total,
        status: lastFailure.statusCode,
        error: lastFailure.message
      });
    }
  }

  const failure = (lastFailure ?? new BackendCallFailedError(backend, `${backend} call failed`)).withAttempts(
    total
  );
  logger.error("Generation backend exhausted its attempts", { backend, attempts: total });
  throw failure;
}
