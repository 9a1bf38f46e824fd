/**
 * Timeout and retry helpers for calls to external providers.
 */
import type { UpstreamPolicy } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import {
  TimeoutError,
  UpstreamError,
  type UpstreamStage,
} from "@middleware/errorHandler";

const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED"]);
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

interface ErrorShape {
  code?: unknown;
  status?: unknown;
  statusCode?: unknown;
  cause?: unknown;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readShape(value: unknown): ErrorShape {
  if (!value || typeof value !== "object") {
    return {};
  }

  return {
    code: "code" in value ? value.code : undefined,
    status: "status" in value ? value.status : undefined,
    statusCode: "statusCode" in value ? value.statusCode : undefined,
    cause: "cause" in value ? value.cause : undefined,
  };
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }

  const candidate = readShape(error);
  const code = candidate.code ?? readShape(candidate.cause).code;
  if (typeof code === "string" && RETRYABLE_CODES.has(code)) {
    return true;
  }

  const status = candidate.statusCode ?? candidate.status;
  return typeof status === "number" && RETRYABLE_STATUSES.has(status);
}

/**
 * Rejects with TimeoutError when `fn` does not settle within `timeoutMs`.
 * The underlying call is not cancelled; its late result is ignored.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(operation, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `fn` up to `maxRetries + 1` times. Only retryable errors trigger
 * another attempt; the wait doubles each time starting at `retryBaseDelayMs`.
 */
export async function withRetry<T>(
  operation: string,
  policy: Pick<UpstreamPolicy, "maxRetries" | "retryBaseDelayMs">,
  fn: () => Promise<T>
): Promise<T> {
  const attempts = policy.maxRetries + 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (e: unknown) {
      if (!isRetryableError(e) || attempt >= attempts) {
        throw e;
      }

      const delayMs = policy.retryBaseDelayMs * 2 ** (attempt - 1);

      logger.log("warn", "UPSTREAM_RETRY", {
        operation,
        attempt,
        delayMs,
        error: e instanceof Error ? e.message : String(e),
      });

      await delay(delayMs);
    }
  }
}

/**
 * Applies the per-call timeout and retry policy to one provider call and
 * converts the final failure into an UpstreamError for `stage`.
 */
export async function callUpstream<T>(
  stage: UpstreamStage,
  policy: UpstreamPolicy,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await withRetry(stage, policy, () =>
      withTimeout(stage, policy.timeoutMs, fn)
    );
  } catch (error: unknown) {
    throw new UpstreamError(stage, error);
  }
}
