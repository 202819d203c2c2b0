export class MigrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnmappedTrackerError extends MigrationError {
  constructor(public readonly tracker: string) {
    super(`No label mapping for tracker "${tracker}"`);
  }
}

export class UnknownLabelError extends MigrationError {
  constructor(public readonly label: string, repository: string) {
    super(`Label "${label}" does not exist in ${repository}`);
  }
}

export class UnresolvedCodeError extends MigrationError {
  constructor(
    public readonly table: string,
    public readonly code: string,
    property: string
  ) {
    super(`Cannot render ${property}: no entry "${code}" in ${table}`);
  }
}

export class DuplicateMappingError extends MigrationError {
  constructor(
    public readonly sourceId: number,
    public readonly targetId: number,
    detail: string
  ) {
    super(`Cannot map Redmine #${sourceId} to Gitea #${targetId}: ${detail}`);
  }
}

export class RegistryClosedError extends MigrationError {
  constructor(sourceId: number) {
    super(`Registry is closed; cannot record Redmine #${sourceId}`);
  }
}

export class RegistryOpenError extends MigrationError {
  constructor() {
    super("References can only be rewritten once the registry is closed");
  }
}

export class RegistryCorruptionError extends MigrationError {}

export class TargetRequestError extends MigrationError {
  constructor(
    public readonly operation: string,
    public readonly status: number | undefined,
    detail: string
  ) {
    super(`Gitea ${operation} failed (${status ?? "no response"}): ${detail}`);
  }
}

export class AssigneeRejectedError extends TargetRequestError {
  constructor(
    public readonly assignee: string,
    status: number | undefined,
    detail: string
  ) {
    super(`create issue with assignee "${assignee}"`, status, detail);
  }
}

export class LabelReconciliationError extends MigrationError {
  constructor(
    public readonly issueNumber: number,
    public readonly intended: number[],
    public readonly observed: number[],
    attempts: number
  ) {
    super(
      `Labels of #${issueNumber} still [${observed.join(", ")}] after ${attempts} attempts, expected [${intended.join(", ")}]`
    );
  }
}

export class MigrationAbortedError extends MigrationError {
  constructor(reason?: unknown) {
    super(
      `Migration aborted${reason instanceof Error ? `: ${reason.message}` : ""}`
    );
  }
}
