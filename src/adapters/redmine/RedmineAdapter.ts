import { isAxiosError } from "axios";
import type { RedminePort } from "../../domain/ports/RedminePort";
import type {
  ChangeEvent,
  CustomField,
  SourceIssue,
} from "../../domain/models/Issue";
import type { LookupTables, UserMap } from "../../domain/models/MappingModels";
import type {
  RedmineCustomField,
  RedmineIssue,
  RedmineJournal,
  RedmineNamed,
  RedmineUser,
} from "../../domain/models/RedmineClientModels";
import { RedmineClient } from "./RedmineClient";

function toTable(items: RedmineNamed[]): Record<string, string> {
  return Object.fromEntries(items.map((i) => [String(i.id), i.name]));
}

function customFieldValue(field: RedmineCustomField): string {
  const { value } = field;
  if (Array.isArray(value)) return value.filter(Boolean).join(", ");
  return value ?? "";
}

export class RedmineAdapter implements RedminePort {
  private users?: Promise<RedmineUser[]>;

  constructor(private redmineClient: RedmineClient) {}

  async getIssues(only?: number[]): Promise<SourceIssue[]> {
    const raw = await this.redmineClient.fetchAllIssues(only);
    return raw.map(this.mapToIssue.bind(this));
  }

  async getJournals(issueId: number): Promise<ChangeEvent[]> {
    const journals = await this.redmineClient.fetchJournals(issueId);
    return journals.map(this.mapToEvent.bind(this));
  }

  async getLookupTables(): Promise<LookupTables> {
    const [statuses, trackers, projects, users] = await Promise.all([
      this.redmineClient.fetchStatuses(),
      this.redmineClient.fetchTrackers(),
      this.redmineClient.fetchProjects(),
      this.getUsers(),
    ]);
    return {
      statuses: toTable(statuses),
      trackers: toTable(trackers),
      projects: toTable(projects),
      users: Object.fromEntries(
        users.map((u) => [String(u.id), `${u.firstname} ${u.lastname}`])
      ),
    };
  }

  async getUserMap(): Promise<UserMap> {
    const users = await this.getUsers();
    return Object.fromEntries(users.map((u) => [String(u.id), u.login]));
  }

  /** The user directory is admin-only; without it, names stay unresolved. */
  private getUsers(): Promise<RedmineUser[]> {
    this.users ??= this.redmineClient.fetchUsers().catch((err: unknown) => {
      if (isAxiosError(err) && err.response?.status === 403) {
        console.warn(
          "⚠️ Redmine user directory is not accessible with this API key"
        );
        return [];
      }
      throw err;
    });
    return this.users;
  }

  private mapToIssue(raw: RedmineIssue): SourceIssue {
    const customFields: CustomField[] = (raw.custom_fields ?? [])
      .map((f) => ({ name: f.name, value: customFieldValue(f) }))
      .filter((f) => f.value !== "");

    return {
      id: raw.id,
      project: raw.project,
      subject: raw.subject,
      description: (raw.description ?? "").replace(/\r\n/g, "\n"),
      status: raw.status.name,
      tracker: raw.tracker.name,
      priority: raw.priority.name,
      author: raw.author,
      assignee: raw.assigned_to,
      category: raw.category?.name,
      doneRatio: raw.done_ratio,
      isPrivate: raw.is_private ?? false,
      createdOn: new Date(raw.created_on),
      customFields,
    };
  }

  private mapToEvent(raw: RedmineJournal): ChangeEvent {
    return {
      id: raw.id,
      user: raw.user,
      notes: raw.private_notes ? undefined : raw.notes ?? undefined,
      createdOn: new Date(raw.created_on),
      changes: raw.details.map((d) => ({
        scope: d.property,
        property: d.name,
        oldValue: d.old_value ?? null,
        newValue: d.new_value ?? null,
      })),
    };
  }
}
