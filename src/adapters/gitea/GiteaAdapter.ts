import { isAxiosError } from "axios";
import type { GiteaPort } from "../../domain/ports/GiteaPort";
import type { TargetIssue } from "../../domain/models/Issue";
import type { LabelTable } from "../../domain/models/MappingModels";
import type {
  GiteaComment,
  GiteaIssue,
  GiteaIssueParams,
} from "../../domain/models/GiteaClientModels";
import {
  AssigneeRejectedError,
  TargetRequestError,
} from "../../domain/models/Errors";
import { GiteaClient } from "./GiteaClient";

interface FailedRequest {
  status?: number;
  detail: string;
}

function describeFailure(err: unknown): FailedRequest {
  if (isAxiosError<{ message?: string }>(err)) {
    return {
      status: err.response?.status,
      detail: err.response?.data?.message ?? err.message,
    };
  }
  return { detail: err instanceof Error ? err.message : String(err) };
}

/** Gitea answers 422 naming the assignee when it cannot resolve the user. */
export function isAssigneeRejection({ status, detail }: FailedRequest): boolean {
  return (
    status === 422 &&
    /assignee|user does not exist|not.*collaborator/i.test(detail)
  );
}

function toTargetIssue(issue: GiteaIssue): TargetIssue {
  return {
    number: issue.number,
    title: issue.title,
    body: issue.body,
    closed: issue.state === "closed",
    labels: (issue.labels ?? []).map((l) => l.id),
    assignee: issue.assignee?.login,
  };
}

export class GiteaAdapter implements GiteaPort {
  readonly repository: string;

  constructor(private giteaClient: GiteaClient) {
    this.repository = `${giteaClient.config.owner}/${giteaClient.config.repo}`;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const { status, detail } = describeFailure(err);
      throw new TargetRequestError(operation, status, detail);
    }
  }

  async listLabels(): Promise<LabelTable> {
    const labels = await this.call("list labels", () =>
      this.giteaClient.listLabels()
    );
    return Object.fromEntries(labels.map((l) => [l.name, l.id]));
  }

  async createIssue(
    params: GiteaIssueParams,
    sudo?: string
  ): Promise<TargetIssue> {
    try {
      return toTargetIssue(await this.giteaClient.createIssue(params, sudo));
    } catch (err) {
      const failure = describeFailure(err);
      if (params.assignee && isAssigneeRejection(failure)) {
        throw new AssigneeRejectedError(
          params.assignee,
          failure.status,
          failure.detail
        );
      }
      throw new TargetRequestError(
        `create issue "${params.title}"`,
        failure.status,
        failure.detail
      );
    }
  }

  async getIssue(issueNumber: number): Promise<TargetIssue> {
    const issue = await this.call(`get issue #${issueNumber}`, () =>
      this.giteaClient.getIssue(issueNumber)
    );
    return toTargetIssue(issue);
  }

  async addComment(
    issueNumber: number,
    body: string,
    sudo?: string
  ): Promise<GiteaComment> {
    return this.call(`comment on #${issueNumber}`, () =>
      this.giteaClient.addComment(issueNumber, body, sudo)
    );
  }

  async editIssueBody(issueNumber: number, body: string): Promise<void> {
    await this.call(`edit issue #${issueNumber}`, () =>
      this.giteaClient.updateIssue(issueNumber, body)
    );
  }

  async editComment(commentId: number, body: string): Promise<void> {
    await this.call(`edit comment ${commentId}`, () =>
      this.giteaClient.updateComment(commentId, body)
    );
  }

  async replaceLabels(
    issueNumber: number,
    labelIds: number[]
  ): Promise<number[]> {
    const labels = await this.call(`label #${issueNumber}`, () =>
      this.giteaClient.replaceLabels(issueNumber, labelIds)
    );
    return labels.map((l) => l.id);
  }
}
