import { z } from "zod";

// Only `type` is required. Malformed sub-fields are dropped so the formatter
// can fall back to a best-effort line instead of rejecting the whole event.
export const activityEventSchema = z.object({
  id: z.string().optional().catch(undefined),
  type: z.string(),
  actor: z
    .object({ login: z.string().optional().catch(undefined) })
    .optional()
    .catch(undefined),
  repo: z
    .object({ name: z.string().optional().catch(undefined) })
    .optional()
    .catch(undefined),
  payload: z.record(z.unknown()).optional().catch(undefined),
  created_at: z.string().optional().catch(undefined),
});

export type ActivityEvent = z.infer<typeof activityEventSchema>;

export type RateLimitInfo = {
  remaining?: number;
  reset?: number;
};

export type ActivityList = {
  // Raw entries in API order; the formatter validates each one.
  events: unknown[];
  rateLimit?: RateLimitInfo;
};
