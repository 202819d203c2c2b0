import axios, { type AxiosInstance } from "axios";
import type { GiteaConfig } from "../../domain/models/ConfigModels";
import type {
  GiteaComment,
  GiteaIssue,
  GiteaIssueParams,
  GiteaLabel,
} from "../../domain/models/GiteaClientModels";

const LABEL_PAGE_SIZE = 50;

function sudoParams(sudo?: string): { sudo?: string } {
  return sudo ? { sudo } : {};
}

export class GiteaClient {
  private client: AxiosInstance;

  constructor(public readonly config: GiteaConfig) {
    this.client = axios.create({
      baseURL: `${config.baseUrl}/api/v1/repos/${config.owner}/${config.repo}`,
      headers: {
        Accept: "application/json",
        Authorization: `token ${config.token}`,
      },
    });
  }

  async listLabels(): Promise<GiteaLabel[]> {
    const all: GiteaLabel[] = [];
    for (let page = 1; ; page++) {
      const { data } = await this.client.get<GiteaLabel[]>("/labels", {
        params: { page, limit: LABEL_PAGE_SIZE },
      });
      all.push(...data);
      if (data.length < LABEL_PAGE_SIZE) break;
    }
    return all;
  }

  async createIssue(
    params: GiteaIssueParams,
    sudo?: string
  ): Promise<GiteaIssue> {
    const { data } = await this.client.post<GiteaIssue>("/issues", params, {
      params: sudoParams(sudo),
    });
    return data;
  }

  async getIssue(issueNumber: number): Promise<GiteaIssue> {
    const { data } = await this.client.get<GiteaIssue>(
      `/issues/${issueNumber}`
    );
    return data;
  }

  async updateIssue(issueNumber: number, body: string): Promise<void> {
    await this.client.patch(`/issues/${issueNumber}`, { body });
  }

  async addComment(
    issueNumber: number,
    body: string,
    sudo?: string
  ): Promise<GiteaComment> {
    const { data } = await this.client.post<GiteaComment>(
      `/issues/${issueNumber}/comments`,
      { body },
      { params: sudoParams(sudo) }
    );
    return data;
  }

  async updateComment(commentId: number, body: string): Promise<void> {
    await this.client.patch(`/issues/comments/${commentId}`, { body });
  }

  /** PUT replaces the whole label set, so repeating it is harmless. */
  async replaceLabels(
    issueNumber: number,
    labels: number[]
  ): Promise<GiteaLabel[]> {
    const { data } = await this.client.put<GiteaLabel[]>(
      `/issues/${issueNumber}/labels`,
      { labels }
    );
    return data;
  }
}
