import { formatInTimeZone } from "date-fns-tz";
import type { ChangeEvent, FieldChange } from "../models/Issue";
import type { LookupTables } from "../models/MappingModels";
import { UnresolvedCodeError } from "../models/Errors";

export const RELATION_KEYS = [
  "blocks",
  "blocked",
  "precedes",
  "follows",
  "relates",
  "duplicates",
  "duplicated",
  "copied_to",
  "copied_from",
] as const;

export type RelationKey = (typeof RELATION_KEYS)[number];

type CodedTable = keyof LookupTables;

export type PropertyKind =
  | { kind: "status" }
  | { kind: "tracker" }
  | { kind: "project" }
  | { kind: "assignee" }
  | { kind: "doneRatio" }
  | { kind: "relation"; relation: RelationKey }
  | { kind: "longText"; field: "subject" | "description" }
  | { kind: "generic" };

const ATTR_KINDS: Record<string, PropertyKind> = {
  status_id: { kind: "status" },
  tracker_id: { kind: "tracker" },
  project_id: { kind: "project" },
  assigned_to_id: { kind: "assignee" },
  done_ratio: { kind: "doneRatio" },
  subject: { kind: "longText", field: "subject" },
  description: { kind: "longText", field: "description" },
};

const LABELS: Record<string, string> = {
  status_id: "Status",
  tracker_id: "Tracker",
  project_id: "Project",
  assigned_to_id: "Assignee",
  done_ratio: "% Done",
  subject: "Subject",
  description: "Description",
  priority_id: "Priority",
  category_id: "Category",
  fixed_version_id: "Target version",
  parent_id: "Parent task",
  start_date: "Start date",
  due_date: "Due date",
  estimated_hours: "Estimated time",
  is_private: "Private",
  blocks: "Blocks",
  blocked: "Blocked by",
  precedes: "Precedes",
  follows: "Follows",
  relates: "Related to",
  duplicates: "Duplicates",
  duplicated: "Duplicated by",
  copied_to: "Copied to",
  copied_from: "Copied from",
};

function isRelationKey(name: string): name is RelationKey {
  return (RELATION_KEYS as readonly string[]).includes(name);
}

export function classifyChange(change: FieldChange): PropertyKind {
  if (change.scope === "relation" && isRelationKey(change.property)) {
    return { kind: "relation", relation: change.property };
  }
  if (change.scope === "attr") {
    return ATTR_KINDS[change.property] ?? { kind: "generic" };
  }
  return { kind: "generic" };
}

function labelFor(change: FieldChange): string {
  switch (change.scope) {
    case "cf":
      return `Custom field ${change.property}`;
    case "attachment":
      return `Attachment ${change.property}`;
    default:
      return LABELS[change.property] ?? change.property;
  }
}

function tableFor(kind: PropertyKind): CodedTable | undefined {
  switch (kind.kind) {
    case "status":
      return "statuses";
    case "tracker":
      return "trackers";
    case "project":
      return "projects";
    case "assignee":
      return "users";
    default:
      return undefined;
  }
}

function quote(text: string): string {
  return `> ${text.replace(/\r\n/g, "\n").replace(/\n/g, "\n> ")}`;
}

export interface RenderContext {
  tables: LookupTables;
  timeZone: string;
  /** Name of the original author when the comment is posted as someone else. */
  attributeTo?: string;
}

export class JournalRenderer {
  renderChange(change: FieldChange, tables: LookupTables): string {
    const kind = classifyChange(change);
    const label = labelFor(change);

    const resolve = (value: string | null): string | null => {
      if (value === null || value === "") return value;
      const table = tableFor(kind);
      let out = value;
      if (table) {
        const resolved = tables[table][value];
        // Users may be missing from a directory the API key cannot read.
        if (resolved === undefined && kind.kind !== "assignee") {
          throw new UnresolvedCodeError(table, value, change.property);
        }
        out = resolved ?? value;
      }
      if (kind.kind === "doneRatio") out = `${out}%`;
      if (kind.kind === "relation") out = `#${out}`;
      return out;
    };

    const from = resolve(change.oldValue) || "None";
    const to = resolve(change.newValue) || "None";

    if (kind.kind === "longText") {
      return `*${label} changed from:*\n${quote(from)}\n\n*to:*\n${quote(to)}`;
    }
    return `*${label} changed from ${from} to ${to}*`;
  }

  render(event: ChangeEvent, ctx: RenderContext): string {
    const note = (event.notes ?? "").replace(/\r\n/g, "\n").trim();
    const clauses = event.changes
      .map((change) => this.renderChange(change, ctx.tables))
      .join("\n");

    const sections = [note, clauses].filter(Boolean).join("\n\n---\n\n");
    const timestamp = formatInTimeZone(
      event.createdOn,
      ctx.timeZone,
      "yyyy-MM-dd HH:mm"
    );

    return [
      sections,
      `*${timestamp} (${ctx.timeZone})*`,
      ctx.attributeTo ? `*Originally posted by ${ctx.attributeTo}*` : "",
    ]
      .filter(Boolean)
      .join("\n\n");
  }
}
