import type { RedminePort } from "../ports/RedminePort";
import type { GiteaPort } from "../ports/GiteaPort";
import type { ChangeEvent, SourceIssue, TargetIssue } from "../models/Issue";
import type { LabelTable, LookupTables } from "../models/MappingModels";
import type { GiteaIssueParams } from "../models/GiteaClientModels";
import type { ReferenceLocation } from "../models/PendingRelation";
import {
  MigrationResult,
  type MigrationSummary,
} from "../models/MigrationResult";
import {
  AssigneeRejectedError,
  MigrationAbortedError,
  MigrationError,
} from "../models/Errors";
import { composeIssueBody } from "../../utils/issueBody";
import { FieldTranslator, type FieldTranslatorOptions } from "./FieldTranslator";
import { JournalRenderer } from "./JournalRenderer";
import type { IdentifierRegistry } from "./IdentifierRegistry";
import type { MigrationCheckpoint } from "./MigrationCheckpoint";
import { captureReferences, ReferenceRewriter } from "./ReferenceRewriter";
import {
  LabelReconciler,
  type LabelRetryPolicy,
  type Sleep,
} from "./LabelReconciler";

export interface IssueMigrationOptions extends FieldTranslatorOptions {
  redmineBaseUrl: string;
  timeZone: string;
  skipEmptyJournals: boolean;
  concurrency: number;
  labelRetry: LabelRetryPolicy;
  sleep?: Sleep;
}

export interface MigrationRun {
  /** Restrict the run to these Redmine issue IDs. */
  only?: number[];
  signal?: AbortSignal;
}

/** State owned by one run; nothing here outlives `migrate()`. */
interface MigrationContext {
  labels: LabelTable;
  tables: LookupTables;
  signal?: AbortSignal;
}

function checkAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new MigrationAbortedError(signal.reason);
}

function chronological(a: ChangeEvent, b: ChangeEvent): number {
  return a.createdOn.getTime() - b.createdOn.getTime() || a.id - b.id;
}

function isEmptyEvent(event: ChangeEvent): boolean {
  return !event.notes?.trim() && event.changes.length === 0;
}

export class IssueMigrationService {
  private translator: FieldTranslator;
  private renderer = new JournalRenderer();
  private reconciler: LabelReconciler;
  private rewriter: ReferenceRewriter;

  constructor(
    private redmine: RedminePort,
    private gitea: GiteaPort,
    private registry: IdentifierRegistry,
    private checkpoint: MigrationCheckpoint,
    private opts: IssueMigrationOptions
  ) {
    this.translator = new FieldTranslator(opts);
    this.reconciler = new LabelReconciler(gitea, opts.labelRetry, opts.sleep);
    this.rewriter = new ReferenceRewriter(gitea);
  }

  /**
   * Phase 1: create every issue with its journals and record the Redmine→Gitea
   * mapping. Phase 2: once all of phase 1 has finished, rewrite the `#id`
   * references captured along the way. Both the mapping and the captured
   * references are persisted as they are produced, so an interrupted run
   * picks up where it stopped.
   */
  async migrate(run: MigrationRun = {}): Promise<MigrationSummary> {
    const loaded = await this.registry.load();
    if (loaded > 0) {
      console.log(`📒 Loaded ${loaded} mappings from a previous run`);
    }
    const unfinished = await this.checkpoint.load();
    if (unfinished > 0) {
      console.log(`🧩 Continuing ${unfinished} unfinished issues`);
    }

    const ctx: MigrationContext = {
      labels: await this.gitea.listLabels(),
      tables: await this.redmine.getLookupTables(),
      signal: run.signal,
    };

    const only = run.only && run.only.length > 0 ? run.only : undefined;
    const issues = await this.redmine.getIssues(only);
    issues.sort((a, b) => a.id - b.id);
    if (only) {
      const found = new Set(issues.map((i) => i.id));
      for (const id of only.filter((id) => !found.has(id))) {
        console.warn(`🚫 Redmine #${id} is not in this project; ignored`);
      }
    }
    console.log(`📥 ${issues.length} Redmine issues to process`);

    const results = await this.runPhaseOne(issues, ctx);
    this.registry.close();

    checkAborted(ctx.signal);
    const rewrite = await this.rewriter.rewriteAll(
      this.checkpoint.deferred(),
      this.registry,
      (ref) => this.checkpoint.consume(ref)
    );
    return { results, rewrite };
  }

  private async runPhaseOne(
    issues: SourceIssue[],
    ctx: MigrationContext
  ): Promise<MigrationResult[]> {
    const results: MigrationResult[] = [];
    let next = 0;
    const failures: unknown[] = [];

    const worker = async (): Promise<void> => {
      while (failures.length === 0 && next < issues.length) {
        const index = next++;
        try {
          results[index] = await this.migrateIssue(issues[index], ctx);
        } catch (error) {
          failures.push(error);
        }
      }
    };

    const workers = Math.max(1, Math.min(this.opts.concurrency, issues.length));
    await Promise.all(Array.from({ length: workers }, worker));
    if (failures.length > 0) throw failures[0];
    return results;
  }

  private async migrateIssue(
    issue: SourceIssue,
    ctx: MigrationContext
  ): Promise<MigrationResult> {
    checkAborted(ctx.signal);

    if (issue.isPrivate) {
      console.log(`🙈 Skipped private Redmine #${issue.id}`);
      return MigrationResult.skipped(issue.id);
    }

    const existing = this.registry.resolve(issue.id);
    if (existing !== undefined && !this.checkpoint.progress(issue.id)) {
      console.log(`⏭️ Redmine #${issue.id} already migrated as #${existing}`);
      return MigrationResult.resumed(issue.id, existing);
    }

    const { labelKeys, closed } = this.translator.translate(
      issue.tracker,
      issue.status,
      issue.priority
    );
    const labels = this.translator.resolveLabelIds(
      labelKeys,
      ctx.labels,
      this.gitea.repository
    );
    const body = composeIssueBody(issue, this.opts.redmineBaseUrl);
    const result: MigrationResult = {
      sourceId: issue.id,
      state: "translated",
      comments: 0,
    };

    let issueNumber: number;
    let observedLabels: number[] | undefined;
    if (existing === undefined) {
      const params: GiteaIssueParams = {
        title: issue.subject,
        body,
        closed,
        labels,
      };
      const assignee = issue.assignee
        ? this.translator.resolveUsername(issue.assignee)
        : undefined;
      if (assignee && !assignee.fallback) params.assignee = assignee.username;

      await this.checkpoint.begin(issue.id);
      const created = await this.createIssue(issue, params, result);
      result.state = "created";
      await this.registry.register(issue.id, created.number);
      issueNumber = created.number;
      observedLabels = created.labels;
    } else {
      console.log(`🔁 Continuing Redmine #${issue.id} as #${existing}`);
      result.continued = true;
      issueNumber = existing;
    }
    result.state = "registered";
    result.targetNumber = issueNumber;

    const progress = this.checkpoint.progress(issue.id);
    if (!progress) {
      throw new MigrationError(`No progress recorded for Redmine #${issue.id}`);
    }
    if (!progress.bodyCaptured) {
      await this.checkpoint.bodyCaptured(
        issue.id,
        captureReferences(this.locate(issueNumber), body)
      );
    }
    if (!progress.labelsApplied) {
      observedLabels ??= (await this.gitea.getIssue(issueNumber)).labels;
      await this.reconciler.reconcile(issueNumber, labels, observedLabels);
      await this.checkpoint.labelsApplied(issue.id);
    }

    checkAborted(ctx.signal);
    const posted = new Set(progress.postedJournals);
    const journals = (await this.redmine.getJournals(issue.id)).sort(
      chronological
    );
    for (const event of journals) {
      checkAborted(ctx.signal);
      if (posted.has(event.id)) continue;
      if (this.opts.skipEmptyJournals && isEmptyEvent(event)) continue;

      const actor = this.translator.resolveUsername(event.user);
      const text = this.renderer.render(event, {
        tables: ctx.tables,
        timeZone: this.opts.timeZone,
        attributeTo: actor.fallback ? event.user.name : undefined,
      });
      const comment = await this.gitea.addComment(
        issueNumber,
        text,
        actor.username || undefined
      );
      await this.checkpoint.journalPosted(
        issue.id,
        event.id,
        captureReferences(this.locate(issueNumber, comment.id), text)
      );
      result.comments++;
    }
    await this.checkpoint.finish(issue.id);
    result.state = "journalApplied";

    console.log(
      `✅ Redmine #${issue.id} → Gitea #${issueNumber} (${result.comments} comments)`
    );
    return result;
  }

  /** Create as the author; drop the assignee once if Gitea refuses it. */
  private async createIssue(
    issue: SourceIssue,
    params: GiteaIssueParams,
    result: MigrationResult
  ): Promise<TargetIssue> {
    const sudo = this.translator.resolveUsername(issue.author).username;
    try {
      return await this.gitea.createIssue(params, sudo || undefined);
    } catch (err) {
      if (!(err instanceof AssigneeRejectedError)) throw err;
      console.warn(
        `👤 Assignee "${err.assignee}" rejected for Redmine #${issue.id}; creating without assignee`
      );
      result.assigneeDropped = true;
      const withoutAssignee: GiteaIssueParams = { ...params };
      delete withoutAssignee.assignee;
      return await this.gitea.createIssue(withoutAssignee, sudo || undefined);
    }
  }

  private locate(issueNumber: number, commentId?: number): ReferenceLocation {
    return { repository: this.gitea.repository, issueNumber, commentId };
  }
}
