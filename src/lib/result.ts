/**
 * Success-or-failure value used at the fallible boundaries of the pipeline
 * (page fetch, page parse, table and checkpoint reads).
 *
 * @example
 * ```ts
 * const parsed = parseReviewPage("B0001", payload);
 * if (!parsed.ok) logger.warn("ingest:parse:failed", { message: parsed.error.message });
 * ```
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export const formatError = (e: unknown): string => (e instanceof Error ? e.message : String(e));
