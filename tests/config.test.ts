import { describe, it, expect } from "vitest";
import { DEFAULT_ISSUE_TYPE_MAP, loadConfig, type Env } from "../src/config";

const base: Env = {
  REDMINE_BASE_URL: "https://redmine.example.org/",
  REDMINE_API_TOKEN: "test-redmine-token",
  REDMINE_PROJECT: "website",
  GITEA_BASE_URL: "https://gitea.example.org",
  GITEA_API_TOKEN: "test-gitea-token",
  GITEA_REPO: "acme/site",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(base, false);
    expect(config.redmine).toEqual({
      baseUrl: "https://redmine.example.org",
      token: "test-redmine-token",
      project: "website",
      pageSize: 100,
    });
    expect(config.gitea).toMatchObject({ owner: "acme", repo: "site" });
    expect(config.mapping).toEqual({
      userMap: {},
      issueTypeMap: DEFAULT_ISSUE_TYPE_MAP,
      priorityLabelMap: {},
      closedStatuses: ["Resolved", "Closed", "Rejected"],
      rejectedStatus: "Rejected",
      rejectedLabel: "wontfix",
      fallbackUsername: undefined,
      deriveUsernames: false,
    });
    expect(config.migration).toEqual({
      registryPath: "id-map.json",
      timeZone: "Europe/Amsterdam",
      skipEmptyJournals: false,
      concurrency: 1,
      timeoutMs: undefined,
      labelRetry: { maxAttempts: 5, intervalMs: 500, backoffFactor: 2 },
    });
  });

  it("reads mappings and switches", () => {
    const config = loadConfig(
      {
        ...base,
        REDMINE_GITEA_USER_MAP: '{"3":"jdevries"}',
        CLOSED_STATUSES: '["Done"]',
        FALLBACK_USERNAME: "migrator",
        SKIP_EMPTY_JOURNALS: "true",
        MIGRATION_CONCURRENCY: "4",
        MIGRATION_TIMEOUT_MS: "60000",
      },
      false
    );
    expect(config.mapping.userMap).toEqual({ "3": "jdevries" });
    expect(config.mapping.closedStatuses).toEqual(["Done"]);
    expect(config.mapping.fallbackUsername).toBe("migrator");
    expect(config.migration.skipEmptyJournals).toBe(true);
    expect(config.migration.concurrency).toBe(4);
    expect(config.migration.timeoutMs).toBe(60000);
  });

  it("rejects missing and malformed variables", () => {
    const { GITEA_API_TOKEN: _omitted, ...withoutToken } = base;
    expect(() => loadConfig(withoutToken, false)).toThrow(
      "Missing required env variable GITEA_API_TOKEN"
    );
    expect(() => loadConfig({ ...base, GITEA_REPO: "site" }, false)).toThrow(
      "GITEA_REPO must look like owner/repo"
    );
    expect(() =>
      loadConfig({ ...base, REDMINE_GITEA_USER_MAP: "{" }, false)
    ).toThrow("Invalid JSON in env var REDMINE_GITEA_USER_MAP");
    expect(() =>
      loadConfig({ ...base, CLOSED_STATUSES: '"Closed"' }, false)
    ).toThrow("Unexpected shape in env var CLOSED_STATUSES");
    expect(() =>
      loadConfig({ ...base, REDMINE_PAGE_SIZE: "many" }, false)
    ).toThrow("Env var REDMINE_PAGE_SIZE must be a non-negative integer");
  });
});
