import { rawReviewSchema, reviewPageSchema } from "../domain/schema";
import { IngestError, ReviewRecord } from "../domain/types";
import { logger as defaultLogger, Logger } from "../config/logger";
import { err, ok, Result } from "../lib/result";

export interface ParsedReviewPage {
  records: ReviewRecord[];
  rejected: number;
  hasNextPage?: boolean;
}

/**
 * Turns one raw page payload into validated records. Accepts a bare array of
 * review objects or `{ reviews, has_next_page }`. Items that fail validation
 * are dropped and counted; an unrecognised payload shape is a parse failure.
 */
export function parseReviewPage(
  entityId: string,
  payload: unknown,
  logger: Logger = defaultLogger
): Result<ParsedReviewPage, IngestError> {
  const page = reviewPageSchema.safeParse(payload);
  if (!page.success) {
    return err({ kind: "parse_failed", message: `unexpected page shape: ${page.error.issues[0]?.message ?? "invalid"}` });
  }
  const items = Array.isArray(page.data) ? page.data : page.data.reviews;
  const hasNextPage = Array.isArray(page.data) ? undefined : page.data.has_next_page;

  const records: ReviewRecord[] = [];
  let rejected = 0;
  items.forEach((item, index) => {
    const parsed = rawReviewSchema.safeParse(item);
    if (!parsed.success) {
      rejected++;
      const issue = parsed.error.issues[0];
      logger.debug("adapter:page:reject", {
        entityId,
        index,
        field: issue?.path.join(".") ?? "",
        message: issue?.message ?? "invalid",
      });
      return;
    }
    const raw = parsed.data;
    records.push({
      entityId: raw.entity_id ?? entityId,
      recordId: raw.record_id ? raw.record_id : null,
      timestampRaw: raw.timestamp_raw,
      rating: raw.rating,
      title: raw.title,
      body: raw.body,
      verified: raw.verified,
      helpfulVotes: raw.helpful_votes,
    });
  });

  if (rejected > 0) logger.warn("adapter:page:rejected", { entityId, rejected, accepted: records.length });
  return ok({ records, rejected, ...(hasNextPage !== undefined ? { hasNextPage } : {}) });
}

export default parseReviewPage;
