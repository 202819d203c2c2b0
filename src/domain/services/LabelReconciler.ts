import { setTimeout as delay } from "node:timers/promises";
import type { GiteaPort } from "../ports/GiteaPort";
import { LabelReconciliationError } from "../models/Errors";
import { sortIds } from "./FieldTranslator";

export interface LabelRetryPolicy {
  maxAttempts: number;
  intervalMs: number;
  backoffFactor: number;
}

export type Sleep = (ms: number) => Promise<unknown>;

function sameLabels(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

/**
 * Gitea may attach labels to a freshly created issue after the create call
 * has returned. Re-assert the intended set until the issue shows it.
 */
export class LabelReconciler {
  constructor(
    private gitea: GiteaPort,
    private policy: LabelRetryPolicy,
    private sleep: Sleep = delay
  ) {}

  /** Resolves with the number of repair attempts that were needed. */
  async reconcile(
    issueNumber: number,
    intended: number[],
    observed: number[]
  ): Promise<number> {
    const want = sortIds(intended);
    let have = sortIds(observed);

    for (let attempt = 1; !sameLabels(want, have); attempt++) {
      if (attempt > this.policy.maxAttempts) {
        throw new LabelReconciliationError(
          issueNumber,
          want,
          have,
          this.policy.maxAttempts
        );
      }
      console.warn(
        `🏷️ Labels of #${issueNumber} are [${have.join(", ")}], expected [${want.join(", ")}] (attempt ${attempt}/${this.policy.maxAttempts})`
      );
      await this.sleep(
        this.policy.intervalMs * this.policy.backoffFactor ** (attempt - 1)
      );
      await this.gitea.replaceLabels(issueNumber, want);
      have = sortIds((await this.gitea.getIssue(issueNumber)).labels);
      if (sameLabels(want, have)) return attempt;
    }
    return 0;
  }
}
