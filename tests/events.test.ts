import { describe, expect, it } from "vitest";

import { GitHubRequestError } from "../src/github/client";
import { eventsUrl, getRecentEvents } from "../src/github/events";
import { jsonResponse, stubFetch } from "./helpers";

function watchEvents(count: number) {
  return Array.from({ length: count }, (_, i) => ({
    id: String(i),
    type: "WatchEvent",
    repo: { name: `example-org/repo-${i}` },
  }));
}

describe("eventsUrl", () => {
  it("builds the public events endpoint for a user", () => {
    expect(eventsUrl("octo-tester")).toBe("https://api.github.com/users/octo-tester/events");
  });

  it("encodes the username", () => {
    expect(eventsUrl("a b/c")).toBe("https://api.github.com/users/a%20b%2Fc/events");
  });
});

describe("getRecentEvents", () => {
  it("keeps the first ten events in API order", async () => {
    const fetchMock = stubFetch(async () => jsonResponse(watchEvents(15)));

    const list = await getRecentEvents("octo-tester");

    expect(fetchMock.mock.calls[0][0]).toBe("https://api.github.com/users/octo-tester/events");
    expect(list.events).toEqual(watchEvents(10));
  });

  it("returns every event when there are fewer than ten", async () => {
    stubFetch(async () => jsonResponse(watchEvents(3)));

    const list = await getRecentEvents("octo-tester");

    expect(list.events).toHaveLength(3);
    expect(list.rateLimit).toBeUndefined();
  });

  it("exposes rate limit headers", async () => {
    stubFetch(async () =>
      jsonResponse([], { headers: { "x-ratelimit-remaining": "12", "x-ratelimit-reset": "1800000000" } }),
    );

    const list = await getRecentEvents("octo-tester");

    expect(list.rateLimit).toEqual({ remaining: 12, reset: 1800000000 });
  });

  it("rejects a body that is not an array", async () => {
    stubFetch(async () => jsonResponse({ message: "unexpected" }));

    const err = await getRecentEvents("octo-tester").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GitHubRequestError);
    expect(err instanceof GitHubRequestError && err.info.kind).toBe("parse");
  });

  it("throws the classified error for a missing user", async () => {
    stubFetch(async () => jsonResponse({ message: "Not Found" }, { status: 404 }));

    const err = await getRecentEvents("ghost-user").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GitHubRequestError);
    expect(err instanceof GitHubRequestError && err.info).toMatchObject({
      kind: "not_found",
      status: 404,
    });
  });
});
