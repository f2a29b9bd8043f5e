import { z } from "zod";

import type { ActivityList, RateLimitInfo } from "../activity/types";
import { GITHUB_API_BASE_URL, MAX_EVENTS } from "../config";
import { fetchGitHubJson, GitHubRequestError, GitHubRequestOptions, GitHubResponseMeta } from "./client";

const eventsPageSchema = z.array(z.unknown());

export function eventsUrl(username: string) {
  return `${GITHUB_API_BASE_URL}/users/${encodeURIComponent(username)}/events`;
}

function compactRateLimit(meta: GitHubResponseMeta): RateLimitInfo | undefined {
  if (meta.rateLimitRemaining == null && meta.rateLimitReset == null) return undefined;
  return { remaining: meta.rateLimitRemaining, reset: meta.rateLimitReset };
}

/**
 * Fetches the first page of a user's public events and keeps the newest
 * {@link MAX_EVENTS}. Throws {@link GitHubRequestError} on any failure.
 */
export async function getRecentEvents(
  username: string,
  options: GitHubRequestOptions = {},
): Promise<ActivityList> {
  const result = await fetchGitHubJson(eventsUrl(username), options);
  if (!result.ok) throw new GitHubRequestError(result.error);

  const page = eventsPageSchema.safeParse(result.data);
  if (!page.success) {
    throw new GitHubRequestError({
      kind: "parse",
      message: "expected a JSON array of events",
    });
  }

  return {
    events: page.data.slice(0, MAX_EVENTS),
    rateLimit: compactRateLimit(result.meta),
  };
}
