import { z } from "zod";

const blankToNull = (v: unknown): unknown => (typeof v === "string" && v.trim() === "" ? null : v);

const numericString = (v: unknown): unknown => {
  if (typeof v !== "string") return v;
  const n = Number(v.trim());
  return Number.isFinite(n) ? n : v;
};

export const rawReviewSchema = z.object({
  entity_id: z.string().trim().min(1, "entity_id must not be blank").optional(),
  record_id: z.preprocess(
    blankToNull,
    z
      .union([z.string(), z.number()])
      .nullish()
      .transform((v) => (v === null || v === undefined ? null : String(v).trim()))
  ),
  timestamp_raw: z.string(),
  rating: z.preprocess(
    (v) => numericString(blankToNull(v)),
    z.number().min(1).max(5).nullish().transform((v) => v ?? null)
  ),
  title: z.string().nullish().transform((v) => v ?? ""),
  body: z.string().nullish().transform((v) => v ?? ""),
  verified: z.preprocess(
    (v) => (v === "true" ? true : v === "false" ? false : v),
    z.boolean().default(false)
  ),
  helpful_votes: z.preprocess(
    (v) => numericString(blankToNull(v)) ?? undefined,
    z.number().int().nonnegative().default(0)
  ),
});

export type RawReview = z.infer<typeof rawReviewSchema>;

export const reviewPageSchema = z.union([
  z.array(z.unknown()),
  z.object({
    reviews: z.array(z.unknown()),
    has_next_page: z.boolean().optional(),
  }),
]);

export const checkpointFileSchema = z.record(
  z.string(),
  z.object({
    last_ids: z.array(z.string()).default([]),
    last_date: z.string().nullable().default(null),
    last_page: z.number().int().nonnegative().optional(),
    complete: z.boolean().optional(),
    run_records: z.number().int().nonnegative().optional(),
    run_pages: z.number().int().nonnegative().optional(),
    known_ids: z.array(z.string()).optional(),
  })
);

export type CheckpointFile = z.infer<typeof checkpointFileSchema>;

export const csvRowsSchema = z.array(z.record(z.string(), z.string()));
