import type { NamedRef } from "../models/Issue";
import type {
  IssueTypeMap,
  LabelTable,
  PriorityLabelMap,
  UserMap,
} from "../models/MappingModels";
import { UnknownLabelError, UnmappedTrackerError } from "../models/Errors";

export interface FieldTranslatorOptions {
  issueTypeMap: IssueTypeMap;
  priorityLabelMap?: PriorityLabelMap;
  userMap: UserMap;
  closedStatuses: string[];
  rejectedStatus: string;
  rejectedLabel: string;
  fallbackUsername?: string;
  /** Guess logins from full names for users missing from `userMap`. */
  deriveUsernames?: boolean;
}

export interface Translation {
  /** Sorted, de-duplicated label names. */
  labelKeys: string[];
  closed: boolean;
}

export interface ResolvedUser {
  username: string;
  /** True when `username` is not the user's own account. */
  fallback: boolean;
}

export class FieldTranslator {
  constructor(private opts: FieldTranslatorOptions) {}

  translate(tracker: string, status: string, priority?: string): Translation {
    const typeLabel = this.opts.issueTypeMap[tracker];
    if (!typeLabel) throw new UnmappedTrackerError(tracker);

    const keys = new Set<string>([typeLabel]);
    if (status === this.opts.rejectedStatus) keys.add(this.opts.rejectedLabel);
    const priorityLabel = priority
      ? this.opts.priorityLabelMap?.[priority]
      : undefined;
    if (priorityLabel) keys.add(priorityLabel);

    return {
      labelKeys: [...keys].sort(),
      closed: this.opts.closedStatuses.includes(status),
    };
  }

  resolveLabelIds(
    labelKeys: string[],
    labels: LabelTable,
    repository: string
  ): number[] {
    const ids = labelKeys.map((key) => {
      const id = labels[key];
      if (id === undefined) throw new UnknownLabelError(key, repository);
      return id;
    });
    return sortIds(ids);
  }

  resolveUsername(user: NamedRef): ResolvedUser {
    const mapped = this.opts.userMap[String(user.id)];
    if (mapped) return { username: mapped, fallback: false };
    const derived = this.opts.deriveUsernames ? toUsername(user.name) : "";
    if (derived) return { username: derived, fallback: false };
    return { username: this.opts.fallbackUsername ?? "", fallback: true };
  }
}

export function sortIds(ids: Iterable<number>): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

/**
 * Guess a login from a full name: first initial, the initial of the first
 * middle particle when the name has more than two parts, then the last name.
 * "Jan van Dijk" → "jvdijk".
 */
export function toUsername(fullName: string): string {
  const parts = fullName.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) return "";
  if (parts.length === 1) return parts[0].toLowerCase();

  const first = parts[0][0];
  const middle = parts.length > 2 ? parts[1][0] : "";
  const last = parts[parts.length - 1];
  return (first + middle + last).toLowerCase();
}
