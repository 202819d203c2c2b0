import axios, { type AxiosInstance } from "axios";
import type { RedmineConfig } from "../../domain/models/ConfigModels";
import type {
  RedmineIssue,
  RedmineJournal,
  RedmineNamed,
  RedminePage,
  RedmineProject,
  RedmineUser,
} from "../../domain/models/RedmineClientModels";

export class RedmineClient {
  private client: AxiosInstance;

  constructor(private config: RedmineConfig) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      headers: {
        Accept: "application/json",
        "X-Redmine-API-Key": config.token,
      },
    });
  }

  /** Walk an offset/limit listing until `total_count` is reached. */
  private async fetchAll<P extends RedminePage, T>(
    path: string,
    pick: (page: P) => T[] | undefined,
    params: Record<string, string | number> = {}
  ): Promise<T[]> {
    const all: T[] = [];
    let offset = 0;

    while (true) {
      const resp = await this.client.get<P>(path, {
        params: { ...params, offset, limit: this.config.pageSize },
      });
      const page = pick(resp.data);
      if (!Array.isArray(page)) {
        throw new Error(`Redmine ${path} returned no list`);
      }
      all.push(...page);

      const total = resp.data.total_count ?? all.length;
      if (page.length === 0 || all.length >= total) break;
      offset += page.length;
    }
    return all;
  }

  /**
   * Every issue of the configured project, whatever its status. `only`
   * narrows the listing to those IDs through the `issue_id` filter, so IDs of
   * other projects drop out.
   */
  async fetchAllIssues(only?: number[]): Promise<RedmineIssue[]> {
    return this.fetchAll(
      `/projects/${encodeURIComponent(this.config.project)}/issues.json`,
      (p: RedminePage & { issues?: RedmineIssue[] }) => p.issues,
      {
        status_id: "*",
        sort: "id",
        ...(only ? { issue_id: only.join(",") } : {}),
      }
    );
  }

  async fetchIssue(id: number, include?: string): Promise<RedmineIssue> {
    const resp = await this.client.get<{ issue: RedmineIssue }>(
      `/issues/${id}.json`,
      { params: include ? { include } : {} }
    );
    return resp.data.issue;
  }

  async fetchJournals(id: number): Promise<RedmineJournal[]> {
    const issue = await this.fetchIssue(id, "journals");
    return issue.journals ?? [];
  }

  /** Requires an administrator key; other keys get 403. */
  async fetchUsers(): Promise<RedmineUser[]> {
    return this.fetchAll(
      "/users.json",
      (p: RedminePage & { users?: RedmineUser[] }) => p.users,
      { status: "" }
    );
  }

  async fetchProjects(): Promise<RedmineProject[]> {
    return this.fetchAll(
      "/projects.json",
      (p: RedminePage & { projects?: RedmineProject[] }) => p.projects
    );
  }

  async fetchStatuses(): Promise<RedmineNamed[]> {
    const resp = await this.client.get<{ issue_statuses: RedmineNamed[] }>(
      "/issue_statuses.json"
    );
    return resp.data.issue_statuses;
  }

  async fetchTrackers(): Promise<RedmineNamed[]> {
    const resp = await this.client.get<{ trackers: RedmineNamed[] }>(
      "/trackers.json"
    );
    return resp.data.trackers;
  }
}
