import type { DeferredReference } from "./PendingRelation";

/** How far an issue got before the run stopped. */
export interface IssueProgress {
  bodyCaptured: boolean;
  labelsApplied: boolean;
  /** Redmine journal IDs already posted as comments. */
  postedJournals: number[];
}

export interface CheckpointData {
  /** Issues started but not finished, by Redmine ID. */
  inFlight: Record<string, IssueProgress>;
  /** References waiting for the rewrite pass. */
  deferred: DeferredReference[];
}
