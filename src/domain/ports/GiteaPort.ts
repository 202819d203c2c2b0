import type { TargetIssue } from "../models/Issue";
import type { LabelTable } from "../models/MappingModels";
import type { GiteaComment, GiteaIssueParams } from "../models/GiteaClientModels";

export interface GiteaPort {
  /** `owner/repo` */
  readonly repository: string;
  listLabels(): Promise<LabelTable>;
  /**
   * Create an issue, optionally as `sudo`. Rejects with
   * `AssigneeRejectedError` when Gitea refuses the assignee.
   */
  createIssue(params: GiteaIssueParams, sudo?: string): Promise<TargetIssue>;
  getIssue(issueNumber: number): Promise<TargetIssue>;
  addComment(
    issueNumber: number,
    body: string,
    sudo?: string
  ): Promise<GiteaComment>;
  editIssueBody(issueNumber: number, body: string): Promise<void>;
  editComment(commentId: number, body: string): Promise<void>;
  /** Sets exactly these labels; returns the label IDs now on the issue. */
  replaceLabels(issueNumber: number, labelIds: number[]): Promise<number[]>;
}
