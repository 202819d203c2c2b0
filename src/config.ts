import dotenv from "dotenv";

import type {
  GiteaConfig,
  MappingConfig,
  MigrationConfig,
  RedmineConfig,
} from "./domain/models/ConfigModels";
import type {
  IssueTypeMap,
  PriorityLabelMap,
  UserMap,
} from "./domain/models/MappingModels";

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  redmine: RedmineConfig;
  gitea: GiteaConfig;
  mapping: MappingConfig;
  migration: MigrationConfig;
}

export const DEFAULT_ISSUE_TYPE_MAP: IssueTypeMap = {
  Bug: "bug",
  Feature: "enhancement",
  Support: "support",
};

function assertEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) throw new Error(`Missing required env variable ${key}`);
  return value;
}

function parseJsonEnv<T>(
  env: Env,
  key: string,
  defaultValue: T,
  isValid: (v: unknown) => v is T
): T {
  const v = env[key];
  if (!v) return defaultValue;
  let parsed: unknown;
  try {
    parsed = JSON.parse(v);
  } catch {
    throw new Error(`Invalid JSON in env var ${key}`);
  }
  if (!isValid(parsed)) throw new Error(`Unexpected shape in env var ${key}`);
  return parsed;
}

function parseIntEnv(env: Env, key: string, defaultValue: number): number {
  const v = env[key];
  if (!v) return defaultValue;
  const n = Number.parseInt(v, 10);
  if (Number.isNaN(n) || n < 0) {
    throw new Error(`Env var ${key} must be a non-negative integer`);
  }
  return n;
}

function parseBoolEnv(env: Env, key: string): boolean {
  return ["1", "true", "yes"].includes((env[key] ?? "").toLowerCase());
}

function isStringRecord(v: unknown): v is Record<string, string> {
  return (
    typeof v === "object" &&
    v !== null &&
    !Array.isArray(v) &&
    Object.values(v).every((x) => typeof x === "string")
  );
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}

function stripSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/** Reads `.env` into `process.env` unless told otherwise, then validates. */
export function loadConfig(env: Env = process.env, useDotenv = true): AppConfig {
  if (useDotenv) dotenv.config();

  const [owner, repo] = assertEnv(env, "GITEA_REPO").split("/");
  if (!owner || !repo) throw new Error("GITEA_REPO must look like owner/repo");

  return {
    redmine: {
      baseUrl: stripSlash(assertEnv(env, "REDMINE_BASE_URL")),
      token: assertEnv(env, "REDMINE_API_TOKEN"),
      project: assertEnv(env, "REDMINE_PROJECT"),
      pageSize: parseIntEnv(env, "REDMINE_PAGE_SIZE", 100),
    },
    gitea: {
      baseUrl: stripSlash(assertEnv(env, "GITEA_BASE_URL")),
      token: assertEnv(env, "GITEA_API_TOKEN"),
      owner,
      repo,
    },
    mapping: {
      userMap: parseJsonEnv<UserMap>(
        env,
        "REDMINE_GITEA_USER_MAP",
        {},
        isStringRecord
      ),
      issueTypeMap: parseJsonEnv<IssueTypeMap>(
        env,
        "REDMINE_GITEA_TRACKER_LABEL_MAP",
        DEFAULT_ISSUE_TYPE_MAP,
        isStringRecord
      ),
      priorityLabelMap: parseJsonEnv<PriorityLabelMap>(
        env,
        "REDMINE_GITEA_PRIORITY_LABEL_MAP",
        {},
        isStringRecord
      ),
      closedStatuses: parseJsonEnv(
        env,
        "CLOSED_STATUSES",
        ["Resolved", "Closed", "Rejected"],
        isStringArray
      ),
      rejectedStatus: env.REJECTED_STATUS || "Rejected",
      rejectedLabel: env.REJECTED_LABEL || "wontfix",
      fallbackUsername: env.FALLBACK_USERNAME || undefined,
      deriveUsernames: parseBoolEnv(env, "DERIVE_USERNAMES"),
    },
    migration: {
      registryPath: env.REGISTRY_PATH || "id-map.json",
      timeZone: env.TIME_ZONE || "Europe/Amsterdam",
      skipEmptyJournals: parseBoolEnv(env, "SKIP_EMPTY_JOURNALS"),
      concurrency: Math.max(1, parseIntEnv(env, "MIGRATION_CONCURRENCY", 1)),
      timeoutMs: env.MIGRATION_TIMEOUT_MS
        ? parseIntEnv(env, "MIGRATION_TIMEOUT_MS", 0)
        : undefined,
      labelRetry: {
        maxAttempts: parseIntEnv(env, "LABEL_RETRY_MAX_ATTEMPTS", 5),
        intervalMs: parseIntEnv(env, "LABEL_RETRY_INTERVAL_MS", 500),
        backoffFactor: 2,
      },
    },
  };
}
