import { activityEventSchema, type ActivityEvent } from "./types";

type Payload = Record<string, unknown>;

type EventFormatter = (repo: string, payload: Payload) => string;

export type FormatOptions = {
  onSkip?: (index: number, reason: string) => void;
};

const UNKNOWN_REPO = "unknown repository";

function stringField(payload: Payload, key: string) {
  const value = payload[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function numberField(payload: Payload, key: string) {
  const value = payload[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function capitalize(input: string) {
  return input.charAt(0).toUpperCase() + input.slice(1);
}

function commitCount(payload: Payload) {
  const size = numberField(payload, "size") ?? numberField(payload, "distinct_size");
  if (size != null) return size;
  const commits = payload.commits;
  return Array.isArray(commits) ? commits.length : 0;
}

function refLabel(payload: Payload, fallbackType: string) {
  const refType = stringField(payload, "ref_type") ?? fallbackType;
  const ref = stringField(payload, "ref");
  return ref ? `${refType} ${ref}` : refType;
}

const EVENT_FORMATTERS: Record<string, EventFormatter> = {
  PushEvent: (repo, payload) => `Pushed ${commitCount(payload)} commit(s) to ${repo}`,
  IssuesEvent: (repo, payload) =>
    `${capitalize(stringField(payload, "action") ?? "updated")} an issue in ${repo}`,
  WatchEvent: (repo) => `Starred ${repo}`,
  CreateEvent: (repo, payload) => `Created ${refLabel(payload, "repository")} in ${repo}`,
  ForkEvent: (repo) => `Forked ${repo}`,
  PullRequestEvent: (repo, payload) =>
    `${capitalize(stringField(payload, "action") ?? "updated")} a pull request in ${repo}`,
  DeleteEvent: (repo, payload) => `Deleted ${refLabel(payload, "branch")} in ${repo}`,
  ReleaseEvent: (repo, payload) =>
    `${capitalize(stringField(payload, "action") ?? "published")} a release in ${repo}`,
  PublicEvent: (repo) => `Made ${repo} public`,
};

export function describeEvent(event: ActivityEvent) {
  const repo = event.repo?.name?.trim() || UNKNOWN_REPO;
  const payload = event.payload ?? {};
  const formatter = Object.hasOwn(EVENT_FORMATTERS, event.type)
    ? EVENT_FORMATTERS[event.type]
    : undefined;
  if (!formatter) return `Did a ${event.type} on ${repo}`;
  return formatter(repo, payload);
}

type FormattedEntry = { ok: true; line: string } | { ok: false; reason: string };

function formatEntry(raw: unknown): FormattedEntry {
  const parsed = activityEventSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    return { ok: false, reason };
  }
  return { ok: true, line: `- ${describeEvent(parsed.data)}` };
}

/**
 * Renders one raw API entry as a list line, or `null` when the entry is not
 * an event record at all.
 */
export function formatEvent(raw: unknown): string | null {
  const entry = formatEntry(raw);
  return entry.ok ? entry.line : null;
}

export function formatActivity(events: readonly unknown[], options: FormatOptions = {}) {
  const lines: string[] = [];
  events.forEach((raw, index) => {
    const entry = formatEntry(raw);
    if (entry.ok) lines.push(entry.line);
    else options.onSkip?.(index, entry.reason);
  });
  return lines;
}
