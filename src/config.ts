export const GITHUB_API_BASE_URL = "https://api.github.com";
export const USER_AGENT = "github-activity-cli/1.0.0";
export const GITHUB_API_VERSION = "2022-11-28";

export const DEFAULT_TIMEOUT_MS = 10_000;
export const MAX_EVENTS = 10;

export type CliConfig = {
  username: string;
  timeoutMs: number;
  verbose: boolean;
};
