import type { BackendName } from "./types/contracts";
import { isRecord, sanitizeForLog } from "./utils";

export class InsightCapsuleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidGenerationRequestError extends InsightCapsuleError {}

export class BackendUnavailableError extends InsightCapsuleError {
  constructor(readonly backend: BackendName, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class BackendCallFailedError extends InsightCapsuleError {
  constructor(
    readonly backend: BackendName,
    message: string,
    readonly statusCode?: number,
    readonly body?: string,
    readonly attempts = 1,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  static fromApiError(backend: BackendName, error: unknown): BackendCallFailedError {
    if (error instanceof BackendCallFailedError) {
      return error;
    }
    const statusCode = extractStatusCode(error);
    const body = sanitizeForLog(extractErrorBody(error));
    const excerpt = body.slice(0, 300);
    const status = statusCode === undefined ? "" : ` (${statusCode})`;

    return new BackendCallFailedError(
      backend,
      `${backend} call failed${status}: ${excerpt || "no response body"}`,
      statusCode,
      body,
      1,
      { cause: error }
    );
  }

  withAttempts(attempts: number): BackendCallFailedError {
    return new BackendCallFailedError(
      this.backend,
      `${this.message} (after ${attempts} attempt${attempts === 1 ? "" : "s"})`,
      this.statusCode,
      this.body,
      attempts,
      { cause: this.cause }
    );
  }
}

export type GenerationUnavailableReason = "no-backend" | "all-failed";

export class GenerationUnavailableError extends InsightCapsuleError {
  constructor(
    readonly reason: GenerationUnavailableReason,
    readonly failures: readonly BackendCallFailedError[] = []
  ) {
    super(
      reason === "no-backend"
        ? "No generation backend is configured"
        : `All generation backends failed: ${failures.map((f) => f.message).join("; ")}`
    );
  }
}

export class RecordingFailedError extends InsightCapsuleError {}

export class TranscriptionFailedError extends InsightCapsuleError {}

export class StorageFailedError extends InsightCapsuleError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

function extractStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;

  if (typeof error.status === "number") return error.status;
  if (typeof error.statusCode === "number") return error.statusCode;

  const resp = error.response;
  if (isRecord(resp) && typeof resp.status === "number") {
    return resp.status;
  }

  return undefined;
}

function extractErrorBody(error: unknown): string {
  if (!isRecord(error)) return String(error);

  if (typeof error.message === "string" && error.message.trim()) return error.message;

  for (const key of ["error", "data", "response", "cause"]) {
    const v = error[key];
    if (!v) continue;
    try {
      const s = typeof v === "string" ? v : JSON.stringify(v);
      if (s && s !== "{}") return s;
    } catch {
      // circular payloads fall through to the next key
    }
  }

  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
