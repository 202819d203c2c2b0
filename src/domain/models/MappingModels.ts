export interface IssueTypeMap {
  [redmineTracker: string]: string;
}

export interface PriorityLabelMap {
  [redminePriority: string]: string;
}

export interface UserMap {
  [redmineUserId: string]: string;
}

export interface LabelTable {
  [giteaLabelName: string]: number;
}

/** ID → display name tables for the coded values found in journals. */
export interface LookupTables {
  statuses: Record<string, string>;
  trackers: Record<string, string>;
  projects: Record<string, string>;
  users: Record<string, string>;
}
