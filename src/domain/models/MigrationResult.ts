import type { UnresolvedReference } from "./PendingRelation";

export type IssueState =
  | "fetched"
  | "skipped"
  | "resumed"
  | "translated"
  | "created"
  | "registered"
  | "journalApplied";

export interface MigrationResult {
  sourceId: number;
  state: IssueState;
  targetNumber?: number;
  comments: number;
  /** Set when the assignee had to be dropped to get the issue created. */
  assigneeDropped?: boolean;
  /** Set when an interrupted earlier run had already created the issue. */
  continued?: boolean;
}

export namespace MigrationResult {
  export function skipped(sourceId: number): MigrationResult {
    return { sourceId, state: "skipped", comments: 0 };
  }

  export function resumed(
    sourceId: number,
    targetNumber: number
  ): MigrationResult {
    return { sourceId, state: "resumed", targetNumber, comments: 0 };
  }
}

export interface RewriteReport {
  updated: number;
  unresolved: UnresolvedReference[];
}

export interface MigrationSummary {
  results: MigrationResult[];
  rewrite: RewriteReport;
}
