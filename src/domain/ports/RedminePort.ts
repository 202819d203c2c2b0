import type { ChangeEvent, SourceIssue } from "../models/Issue";
import type { LookupTables, UserMap } from "../models/MappingModels";

export interface RedminePort {
  /**
   * Issues of the configured project, any status, ordered by ID. With `only`,
   * just those IDs; IDs outside the project are left out.
   */
  getIssues(only?: number[]): Promise<SourceIssue[]>;
  getJournals(issueId: number): Promise<ChangeEvent[]>;
  getLookupTables(): Promise<LookupTables>;
  /** Redmine user ID → login for every user the API key can see. */
  getUserMap(): Promise<UserMap>;
}
