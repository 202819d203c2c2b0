export interface NamedRef {
  id: number;
  name: string;
}

export interface CustomField {
  name: string;
  value: string;
}

export interface SourceIssue {
  id: number;
  project: NamedRef;
  subject: string;
  description: string;
  status: string;
  tracker: string;
  priority: string;
  author: NamedRef;
  assignee?: NamedRef;
  category?: string;
  doneRatio: number;
  isPrivate: boolean;
  createdOn: Date;
  customFields: CustomField[];
}

export type ChangeScope = "attr" | "relation" | "cf" | "attachment";

export interface FieldChange {
  scope: ChangeScope;
  property: string;
  oldValue: string | null;
  newValue: string | null;
}

export interface ChangeEvent {
  id: number;
  changes: FieldChange[];
  notes?: string;
  user: NamedRef;
  createdOn: Date;
}

export interface TargetIssue {
  number: number;
  title: string;
  body: string;
  closed: boolean;
  labels: number[];
  assignee?: string;
}
