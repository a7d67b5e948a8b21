import { z } from 'zod';

export const RecommendationSchema = z.object({
  stack_name: z.string().min(1),
  core_components: z.array(z.string()),
  justification: z.string().min(1),
  pros: z.array(z.string()).optional().default([]),
  cons: z.array(z.string()).optional().default([]),
  addressed_follow_up: z.string().optional()
});

export const RecommendationListSchema = z.array(RecommendationSchema).max(3);

export function validateRecommendations(raw: unknown) {
  return RecommendationListSchema.safeParse(raw);
}
