import { DEFAULT_TIMEOUT_MS, GITHUB_API_VERSION, USER_AGENT } from "../config";

export type GitHubErrorKind =
  | "not_found"
  | "rate_limit"
  | "api"
  | "network"
  | "timeout"
  | "parse";

export type GitHubErrorInfo = {
  kind: GitHubErrorKind;
  status?: number;
  rateLimitReset?: number;
  message?: string;
};

export type GitHubResponseMeta = {
  rateLimitRemaining?: number;
  rateLimitReset?: number;
};

export type GitHubResult<T> =
  | { ok: true; data: T; meta: GitHubResponseMeta }
  | { ok: false; error: GitHubErrorInfo };

export type GitHubRequestOptions = {
  timeoutMs?: number;
};

const MAX_MESSAGE_LENGTH = 200;

export class GitHubRequestError extends Error {
  info: GitHubErrorInfo;

  constructor(info: GitHubErrorInfo) {
    super(info.message ?? "GitHub API request failed");
    this.name = "GitHubRequestError";
    this.info = info;
  }
}

function ghHeaders() {
  const headers: Record<string, string> = {
    accept: "application/vnd.github+json",
    "user-agent": USER_AGENT,
    "x-github-api-version": GITHUB_API_VERSION,
  };
  return headers;
}

function parseNumberHeader(headers: Headers, name: string) {
  const raw = headers.get(name);
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

// Epoch seconds; values outside the Date range are dropped.
function parseEpochHeader(headers: Headers, name: string) {
  const value = parseNumberHeader(headers, name);
  if (value == null) return undefined;
  return Number.isNaN(new Date(value * 1000).getTime()) ? undefined : value;
}

function extractMeta(headers: Headers): GitHubResponseMeta {
  return {
    rateLimitRemaining: parseNumberHeader(headers, "x-ratelimit-remaining"),
    rateLimitReset: parseEpochHeader(headers, "x-ratelimit-reset"),
  };
}

function summarizeText(input: string, maxLen = MAX_MESSAGE_LENGTH) {
  const s = input.replaceAll(/\s+/g, " ").trim();
  if (!s) return undefined;
  return s.slice(0, maxLen);
}

function parseErrorMessage(text: string) {
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    if (
      parsed &&
      typeof parsed === "object" &&
      "message" in parsed &&
      typeof parsed.message === "string"
    ) {
      return summarizeText(parsed.message);
    }
  } catch {
    // Not JSON; fall back to the raw body.
  }
  return summarizeText(text);
}

function classifyErrorKind(status: number): GitHubErrorKind {
  if (status === 404) return "not_found";
  if (status === 403) return "rate_limit";
  return "api";
}

// fetch() reports most connection failures as "fetch failed" and keeps the
// useful detail (ENOTFOUND, ECONNREFUSED, ...) on `cause`.
function describeNetworkError(err: unknown) {
  if (!(err instanceof Error)) return "Network error";
  const cause: unknown = err.cause;
  if (cause instanceof Error && cause.message) return `${err.message} (${cause.message})`;
  return err.message || "Network error";
}

// Settles with `promise` unless `signal` aborts first. Reading a body does
// not always observe the request signal, so both stages go through this.
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(resolve, reject).finally(() => {
      signal.removeEventListener("abort", onAbort);
    });
  });
}

/**
 * Performs one GET and reads the whole body as JSON. The timeout covers the
 * request and the body; nothing is retried.
 */
export async function fetchGitHubJson(
  url: string,
  options: GitHubRequestOptions = {},
): Promise<GitHubResult<unknown>> {
  const controller = new AbortController();
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  const failure = (err: unknown): GitHubResult<unknown> => {
    if (controller.signal.aborted) {
      return {
        ok: false,
        error: { kind: "timeout", message: `request timed out after ${timeoutMs}ms` },
      };
    }
    return { ok: false, error: { kind: "network", message: describeNetworkError(err) } };
  };

  try {
    let res: Response;
    try {
      res = await abortable(
        fetch(url, { headers: ghHeaders(), signal: controller.signal }),
        controller.signal,
      );
    } catch (err) {
      return failure(err);
    }

    const meta = extractMeta(res.headers);

    if (!res.ok) {
      let text: string;
      try {
        text = await abortable(res.text(), controller.signal);
      } catch (err) {
        if (controller.signal.aborted) return failure(err);
        text = "";
      }
      return {
        ok: false,
        error: {
          kind: classifyErrorKind(res.status),
          status: res.status,
          rateLimitReset: meta.rateLimitReset,
          message: parseErrorMessage(text) ?? summarizeText(res.statusText),
        },
      };
    }

    try {
      const data: unknown = await abortable(res.json(), controller.signal);
      return { ok: true, data, meta };
    } catch (err) {
      if (err instanceof SyntaxError && !controller.signal.aborted) {
        return {
          ok: false,
          error: { kind: "parse", status: res.status, message: err.message },
        };
      }
      return failure(err);
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
