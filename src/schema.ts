import { z } from 'zod';

import { InvalidDataError } from './errors.js';

/** `predictionNumber` sent as an object when a model declined to score the media. */
export const notEvaluatedSchema = z
  .object({
    reason: z.string().nullish(),
    decision: z.string().nullish(),
  })
  .passthrough();

export const rawModelResultSchema = z.object({
  name: z.string(),
  status: z.string(),
  predictionNumber: z.union([z.number(), notEvaluatedSchema]).nullish(),
  normalizedPredictionNumber: z.number().nullish(),
  finalScore: z.number().nullish(),
  info: z.unknown().optional(),
});

export const resultsSummarySchema = z.object({
  status: z.string(),
  metadata: z.record(z.unknown()).nullish(),
});

export const rawAnalysisPayloadSchema = z.object({
  requestId: z.string(),
  overallStatus: z.string(),
  finalScore: z.number().nullish(),
  models: z
    .array(rawModelResultSchema)
    .nullish()
    .transform((models) => models ?? []),
  resultsSummary: resultsSummarySchema.nullish(),
  info: z.unknown().optional(),
  createdAt: z.string().nullish(),
  updatedAt: z.string().nullish(),
});

export const rawResultPageSchema = z.object({
  totalItems: z.number().int(),
  totalPages: z.number().int(),
  currentPage: z.number().int(),
  currentPageItemsCount: z.number().int(),
  mediaList: z.array(rawAnalysisPayloadSchema),
});

export const signedUrlResponseSchema = z.object({
  code: z.string().optional(),
  errno: z.number().optional(),
  requestId: z.string(),
  mediaId: z.string(),
  response: z.object({
    signedUrl: z.string().url(),
  }),
});

export const socialMediaResponseSchema = z.object({
  code: z.string().optional(),
  errno: z.number().optional(),
  response: z.string().nullish(),
  requestId: z.string().nullish(),
});

export type NotEvaluatedPrediction = z.infer<typeof notEvaluatedSchema>;
export type RawModelResult = z.infer<typeof rawModelResultSchema>;
export type RawResultsSummary = z.infer<typeof resultsSummarySchema>;
export type RawAnalysisPayload = z.infer<typeof rawAnalysisPayloadSchema>;
export type RawResultPage = z.infer<typeof rawResultPageSchema>;
export type SignedUrlResponse = z.infer<typeof signedUrlResponseSchema>;
export type SocialMediaResponse = z.infer<typeof socialMediaResponseSchema>;

export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, description: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidDataError(
      `Unexpected ${description} payload${location}: ${issue?.message ?? 'invalid shape'}`,
      parsed.error,
    );
  }
  return parsed.data;
}
