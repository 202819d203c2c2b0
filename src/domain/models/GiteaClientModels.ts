export interface GiteaIssueParams {
  title: string;
  body: string;
  closed: boolean;
  labels: number[];
  assignee?: string;
}

export interface GiteaLabel {
  id: number;
  name: string;
}

export interface GiteaIssue {
  number: number;
  title: string;
  body: string;
  state: "open" | "closed";
  labels: GiteaLabel[] | null;
  assignee?: { login: string } | null;
}

export interface GiteaComment {
  id: number;
  body: string;
}
