import { setTimeout as delay } from "timers/promises";
import { IngestError, ReviewSource } from "../domain/types";
import { logger as defaultLogger, Logger } from "../config/logger";
import { err, formatError, ok, Result } from "../lib/result";

export interface FetchPageOptions {
  maxRetries: number;
  retryBackoffMs: number;
  fetchTimeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
}

type AttemptFailure = { kind: "timeout" } | { kind: "error"; message: string };

// Resolves false when the run is aborted during the wait
async function backoff(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (e) {
    if (signal?.aborted) return false;
    throw e;
  }
}

async function attemptFetch(
  source: ReviewSource,
  entityId: string,
  page: number,
  timeoutMs: number,
  runSignal: AbortSignal | undefined
): Promise<Result<unknown, AttemptFailure>> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  runSignal?.addEventListener("abort", onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), timeoutMs);
  });

  try {
    const fetched = source.fetchPage({ entityId, page, signal: controller.signal }).then((value) => ({ value }));
    const outcome = await Promise.race([fetched, timedOut]);
    if (outcome === "timeout") {
      controller.abort();
      return err({ kind: "timeout" });
    }
    return ok(outcome.value);
  } catch (e) {
    return err({ kind: "error", message: formatError(e) });
  } finally {
    clearTimeout(timer);
    runSignal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Fetches one page, retrying transient failures (errors and timeouts) with
 * exponential backoff. Gives up after `maxRetries` retries.
 */
export async function fetchPageWithRetry(
  source: ReviewSource,
  entityId: string,
  page: number,
  options: FetchPageOptions
): Promise<Result<unknown, IngestError>> {
  const { maxRetries, retryBackoffMs, fetchTimeoutMs, signal, logger = defaultLogger } = options;
  const maxAttempts = maxRetries + 1;
  let last: AttemptFailure = { kind: "error", message: "not attempted" };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) return err({ kind: "aborted" });

    const result = await attemptFetch(source, entityId, page, fetchTimeoutMs, signal);
    if (result.ok) return result;
    last = result.error;

    if (signal?.aborted) return err({ kind: "aborted" });
    logger.warn("ingest:fetch:retry", {
      entityId,
      page,
      attempt,
      maxAttempts,
      reason: last.kind === "timeout" ? `timeout after ${fetchTimeoutMs}ms` : last.message,
    });
    if (attempt < maxAttempts && retryBackoffMs > 0) {
      const waited = await backoff(retryBackoffMs * 2 ** (attempt - 1), signal);
      if (!waited) return err({ kind: "aborted" });
    }
  }

  if (last.kind === "timeout") return err({ kind: "timeout", timeoutMs: fetchTimeoutMs, attempts: maxAttempts });
  return err({ kind: "fetch_failed", message: last.message, attempts: maxAttempts });
}

export default fetchPageWithRetry;
