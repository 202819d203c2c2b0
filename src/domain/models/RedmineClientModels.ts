export interface RedmineNamed {
  id: number;
  name: string;
}

export interface RedmineCustomField {
  id: number;
  name: string;
  value?: string | string[] | null;
  multiple?: boolean;
}

export interface RedmineIssue {
  id: number;
  project: RedmineNamed;
  tracker: RedmineNamed;
  status: RedmineNamed;
  priority: RedmineNamed;
  author: RedmineNamed;
  assigned_to?: RedmineNamed;
  category?: RedmineNamed;
  subject: string;
  description?: string | null;
  done_ratio: number;
  is_private?: boolean;
  custom_fields?: RedmineCustomField[];
  created_on: string;
  journals?: RedmineJournal[];
}

export interface RedmineJournalDetail {
  property: "attr" | "relation" | "cf" | "attachment";
  name: string;
  old_value?: string | null;
  new_value?: string | null;
}

export interface RedmineJournal {
  id: number;
  user: RedmineNamed;
  notes?: string | null;
  created_on: string;
  private_notes?: boolean;
  details: RedmineJournalDetail[];
}

export interface RedmineUser {
  id: number;
  login: string;
  firstname: string;
  lastname: string;
}

export interface RedmineProject {
  id: number;
  name: string;
  identifier: string;
}

export interface RedminePage {
  total_count?: number;
  offset?: number;
  limit?: number;
}
