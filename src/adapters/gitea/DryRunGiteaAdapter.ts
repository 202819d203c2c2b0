import type { GiteaPort } from "../../domain/ports/GiteaPort";
import type { TargetIssue } from "../../domain/models/Issue";
import type { LabelTable } from "../../domain/models/MappingModels";
import type {
  GiteaComment,
  GiteaIssueParams,
} from "../../domain/models/GiteaClientModels";

/** Logs every write and answers with made-up numbers. */
export class DryRunGiteaAdapter implements GiteaPort {
  readonly repository: string;
  private labels: LabelTable;
  private issues = new Map<number, TargetIssue>();
  private nextIssue: number;
  private nextComment = 1;

  /** `firstNumber` should clear the numbers an earlier dry run handed out. */
  constructor(repository: string, labelNames: string[], firstNumber = 1) {
    this.repository = repository;
    this.nextIssue = firstNumber;
    this.labels = Object.fromEntries(
      [...new Set(labelNames)].sort().map((name, i) => [name, i + 1])
    );
  }

  async listLabels(): Promise<LabelTable> {
    return { ...this.labels };
  }

  async createIssue(
    params: GiteaIssueParams,
    sudo?: string
  ): Promise<TargetIssue> {
    const issue: TargetIssue = { number: this.nextIssue++, ...params };
    this.issues.set(issue.number, issue);
    console.log(
      `[DryRun] would create issue #${issue.number} as ${sudo ?? "(token owner)"}: ${params.title}`
    );
    return issue;
  }

  async getIssue(issueNumber: number): Promise<TargetIssue> {
    const issue = this.issues.get(issueNumber);
    if (issue) return issue;
    // Created by an earlier dry run; only its number is known.
    const placeholder: TargetIssue = {
      number: issueNumber,
      title: "",
      body: "",
      closed: false,
      labels: [],
    };
    this.issues.set(issueNumber, placeholder);
    return placeholder;
  }

  async addComment(
    issueNumber: number,
    body: string,
    sudo?: string
  ): Promise<GiteaComment> {
    const id = this.nextComment++;
    console.log(
      `[DryRun] would comment ${id} on #${issueNumber} as ${sudo ?? "(token owner)"}`
    );
    return { id, body };
  }

  async editIssueBody(issueNumber: number, body: string): Promise<void> {
    console.log(`[DryRun] would update body of #${issueNumber}:\n${body}`);
  }

  async editComment(commentId: number, body: string): Promise<void> {
    console.log(`[DryRun] would update comment ${commentId}:\n${body}`);
  }

  async replaceLabels(
    issueNumber: number,
    labelIds: number[]
  ): Promise<number[]> {
    const issue = await this.getIssue(issueNumber);
    issue.labels = [...labelIds];
    return issue.labels;
  }
}
