import { z } from "zod";

/** 200 body of the profanity-check HTTP service. */
export const ProfanityResponseSchema = z.object({
  status: z.string(),
  forbidden_words: z.array(z.string()).nullish(),
  original_text: z.string().nullish(),
  masked_text: z.string().nullish(),
});
export type ProfanityResponse = z.infer<typeof ProfanityResponseSchema>;

/** Strict JSON contract the LLM classifier is asked to fill. */
export const LlmVerdictSchema = z.object({
  status: z.enum(["forbidden", "ok"]),
  forbidden_words: z.array(z.string().min(1).max(100)).max(20).default([]),
});
export type LlmVerdict = z.infer<typeof LlmVerdictSchema>;

/** Raw `violations` row as returned by SQLite. */
export const ViolationRowSchema = z.object({
  group_id: z.string(),
  user_id: z.string(),
  user_name: z.string().nullable(),
  violation_count: z.number().int().min(1),
  forbidden_words: z.string().nullable(),
  original_text: z.string().nullable(),
  ban_duration: z.number().int().min(0).nullable(),
  last_violation_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  created_at: z.number(),
});
export type ViolationRow = z.infer<typeof ViolationRowSchema>;

export const WordListSchema = z.array(z.string());
