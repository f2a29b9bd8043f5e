import yargs from "yargs";

import { formatActivity } from "./activity/format";
import type { RateLimitInfo } from "./activity/types";
import { type CliConfig, DEFAULT_TIMEOUT_MS } from "./config";
import { GitHubRequestError, type GitHubErrorInfo } from "./github/client";
import { getRecentEvents } from "./github/events";

export const PROGRAM_NAME = "github-activity";
const USAGE = `${PROGRAM_NAME} <username>`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type ParsedArgs = { help: true; text: string } | { help: false; config: CliConfig };

function buildParser(args: string[]) {
  return yargs(args)
    .scriptName(PROGRAM_NAME)
    .usage(`Usage: ${USAGE}\n\nPrint a GitHub user's most recent public activity.`)
    .parserConfiguration({ "parse-positional-numbers": false })
    // --help is declared below and handled by the caller.
    .help(false)
    .version(false)
    .options({
      timeout: {
        type: "number",
        default: DEFAULT_TIMEOUT_MS,
        describe: "request timeout in milliseconds",
      },
      verbose: {
        type: "boolean",
        default: false,
        describe: "report skipped events and rate limit status on stderr",
      },
      help: {
        alias: "h",
        type: "boolean",
        default: false,
        describe: "show this help",
      },
    })
    .strictOptions()
    .exitProcess(false)
    .fail((msg, err) => {
      throw new UsageError(err?.message ?? msg);
    });
}

export async function parseArgs(args: string[]): Promise<ParsedArgs> {
  const parser = buildParser(args);
  const argv = parser.parseSync();

  if (argv.help) {
    return { help: true, text: await parser.getHelp() };
  }

  const positionals = argv._.map(String);
  if (positionals.length === 0) {
    throw new UsageError("missing required argument <username>");
  }
  if (positionals.length > 1) {
    throw new UsageError(`expected exactly one username, got ${positionals.length}`);
  }

  const username = positionals[0].trim();
  if (!username) throw new UsageError("Username cannot be empty");

  if (!Number.isFinite(argv.timeout) || argv.timeout <= 0) {
    throw new UsageError("--timeout must be a positive number of milliseconds");
  }

  return {
    help: false,
    config: { username, timeoutMs: argv.timeout, verbose: argv.verbose },
  };
}

function formatResetTime(reset: number) {
  const date = new Date(reset * 1000);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

export function describeGitHubError(info: GitHubErrorInfo, username: string) {
  switch (info.kind) {
    case "not_found":
      return `Error: User '${username}' not found`;
    case "rate_limit": {
      const resetAt = info.rateLimitReset != null ? formatResetTime(info.rateLimitReset) : undefined;
      const suffix = resetAt ? ` (resets at ${resetAt})` : "";
      return `Error: API rate limit exceeded. Please try again later${suffix}`;
    }
    case "api": {
      const detail = info.message ? `: ${info.message}` : "";
      return `Error: HTTP error ${info.status ?? "unknown"}${detail}`;
    }
    case "network":
    case "timeout":
      return `Connection Error: Network error: ${info.message ?? "request failed"}`;
    case "parse":
      return "Error: Invalid response from GitHub API";
  }
}

function describeFailure(err: unknown, username: string) {
  if (err instanceof GitHubRequestError) return describeGitHubError(err.info, username);
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

function logRateLimit(rateLimit: RateLimitInfo | undefined) {
  if (!rateLimit) return;
  const parts: string[] = [];
  if (rateLimit.remaining != null) parts.push(`${rateLimit.remaining} requests remaining`);
  const resetAt = rateLimit.reset != null ? formatResetTime(rateLimit.reset) : undefined;
  if (resetAt) parts.push(`resets at ${resetAt}`);
  if (!parts.length) return;
  console.warn(`Rate limit: ${parts.join(", ")}`);
}

/**
 * Runs one ParseArgs → Fetch → Render cycle and resolves with the process
 * exit code. Activity goes to stdout; the single error line goes to stderr.
 */
export async function main(args: string[]): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = await parseArgs(args);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${detail} (usage: ${USAGE})`);
    return 1;
  }

  if (parsed.help) {
    console.log(parsed.text);
    return 0;
  }

  const { username, timeoutMs, verbose } = parsed.config;

  let events: unknown[];
  try {
    const list = await getRecentEvents(username, { timeoutMs });
    if (verbose) logRateLimit(list.rateLimit);
    events = list.events;
  } catch (err) {
    console.error(describeFailure(err, username));
    return 1;
  }

  const lines = formatActivity(events, {
    onSkip: (index, reason) => {
      if (verbose) console.warn(`Warning: skipped event #${index + 1}: ${reason}`);
    },
  });

  if (!lines.length) {
    console.log("No recent activity found.");
    return 0;
  }

  for (const line of lines) console.log(line);
  return 0;
}
