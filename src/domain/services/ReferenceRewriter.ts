import type { GiteaPort } from "../ports/GiteaPort";
import type {
  DeferredReference,
  ReferenceLocation,
  ReferenceToken,
  UnresolvedReference,
} from "../models/PendingRelation";
import type { RewriteReport } from "../models/MigrationResult";
import { RegistryOpenError } from "../models/Errors";
import type { IdentifierRegistry } from "./IdentifierRegistry";

// `#123`, but not `&#39;`, `##1`, `page#1` or `/#/1`.
const ISSUE_REF = /(?<![\w&#/])#(\d+)(?!\w)/g;

export function scanReferences(text: string): ReferenceToken[] {
  const seen = new Map<string, ReferenceToken>();
  for (const m of text.matchAll(ISSUE_REF)) {
    if (!seen.has(m[0])) {
      seen.set(m[0], { token: m[0], sourceId: Number(m[1]) });
    }
  }
  return [...seen.values()];
}

export function captureReferences(
  location: ReferenceLocation,
  text: string
): DeferredReference | undefined {
  const tokens = scanReferences(text);
  if (tokens.length === 0) return undefined;
  return { ...location, text, tokens };
}

export function formatRewrittenRef(targetId: number, sourceId: number): string {
  return `#${targetId} (original-id: ${sourceId})`;
}

function describe(location: ReferenceLocation): string {
  return location.commentId === undefined
    ? `${location.repository}#${location.issueNumber}`
    : `${location.repository}#${location.issueNumber} comment ${location.commentId}`;
}

export class ReferenceRewriter {
  constructor(private gitea: GiteaPort) {}

  /** Substitute every resolvable token; unresolved ones are returned. */
  rewriteText(
    ref: DeferredReference,
    registry: IdentifierRegistry
  ): { text: string; unresolved: UnresolvedReference[] } {
    const location: ReferenceLocation = {
      repository: ref.repository,
      issueNumber: ref.issueNumber,
      commentId: ref.commentId,
    };
    const unresolved: UnresolvedReference[] = ref.tokens
      .filter((t) => registry.resolve(t.sourceId) === undefined)
      .map((t) => ({ location, token: t.token, sourceId: t.sourceId }));

    const text = ref.text.replace(ISSUE_REF, (match, digits: string) => {
      const targetId = registry.resolve(Number(digits));
      return targetId === undefined
        ? match
        : formatRewrittenRef(targetId, Number(digits));
    });
    return { text, unresolved };
  }

  /**
   * Phase 2. Only valid once every issue has been created and the registry
   * closed; each location gets at most one edit. `consumed` runs after each
   * reference has been handled.
   */
  async rewriteAll(
    refs: DeferredReference[],
    registry: IdentifierRegistry,
    consumed?: (ref: DeferredReference) => Promise<void>
  ): Promise<RewriteReport> {
    if (!registry.isClosed) throw new RegistryOpenError();

    const report: RewriteReport = { updated: 0, unresolved: [] };
    for (const ref of refs) {
      const { text, unresolved } = this.rewriteText(ref, registry);
      for (const u of unresolved) {
        console.warn(
          `⚠️ Unresolved reference ${u.token} in ${describe(u.location)}`
        );
      }
      report.unresolved.push(...unresolved);

      if (text !== ref.text) {
        if (ref.commentId === undefined) {
          await this.gitea.editIssueBody(ref.issueNumber, text);
        } else {
          await this.gitea.editComment(ref.commentId, text);
        }
        report.updated++;
        console.log(`🔄 Rewrote references in ${describe(ref)}`);
      }
      await consumed?.(ref);
    }
    return report;
  }
}
