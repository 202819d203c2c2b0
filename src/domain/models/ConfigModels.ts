import type {
  IssueTypeMap,
  PriorityLabelMap,
  UserMap,
} from "./MappingModels";

export interface RedmineConfig {
  baseUrl: string;
  token: string;
  project: string;
  pageSize: number;
}

export interface GiteaConfig {
  baseUrl: string;
  token: string;
  owner: string;
  repo: string;
}

export interface MappingConfig {
  userMap: UserMap;
  issueTypeMap: IssueTypeMap;
  priorityLabelMap: PriorityLabelMap;
  closedStatuses: string[];
  rejectedStatus: string;
  rejectedLabel: string;
  fallbackUsername?: string;
  deriveUsernames: boolean;
}

export interface MigrationConfig {
  registryPath: string;
  timeZone: string;
  skipEmptyJournals: boolean;
  concurrency: number;
  timeoutMs?: number;
  labelRetry: {
    maxAttempts: number;
    intervalMs: number;
    backoffFactor: number;
  };
}
