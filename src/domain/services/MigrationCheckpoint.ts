import { Mutex } from "async-mutex";
import type { CheckpointStore } from "../ports/CheckpointStore";
import type { CheckpointData, IssueProgress } from "../models/Checkpoint";
import type { DeferredReference } from "../models/PendingRelation";

/**
 * Progress that lives beside the registry: issues whose migration started
 * but did not finish, and the references still waiting for the rewrite pass.
 * Every change is written through before the method resolves.
 */
export class MigrationCheckpoint {
  private inFlight = new Map<number, IssueProgress>();
  private pending: DeferredReference[] = [];
  private lock = new Mutex();

  constructor(private store: CheckpointStore) {}

  /** Returns the number of issues left unfinished by a previous run. */
  async load(): Promise<number> {
    const data = await this.store.read();
    this.inFlight = new Map(
      Object.entries(data?.inFlight ?? {}).map(([id, p]) => [Number(id), p])
    );
    this.pending = [...(data?.deferred ?? [])];
    return this.inFlight.size;
  }

  progress(sourceId: number): IssueProgress | undefined {
    const p = this.inFlight.get(sourceId);
    return p && { ...p, postedJournals: [...p.postedJournals] };
  }

  deferred(): DeferredReference[] {
    return [...this.pending];
  }

  /** Marks the issue as started; written before the issue is created. */
  async begin(sourceId: number): Promise<void> {
    await this.mutate(() => {
      this.inFlight.set(sourceId, {
        bodyCaptured: false,
        labelsApplied: false,
        postedJournals: [],
      });
    });
  }

  async bodyCaptured(sourceId: number, ref?: DeferredReference): Promise<void> {
    await this.mutate(() => {
      this.update(sourceId, (p) => ({ ...p, bodyCaptured: true }));
      if (ref) this.pending.push(ref);
    });
  }

  async labelsApplied(sourceId: number): Promise<void> {
    await this.mutate(() => {
      this.update(sourceId, (p) => ({ ...p, labelsApplied: true }));
    });
  }

  async journalPosted(
    sourceId: number,
    journalId: number,
    ref?: DeferredReference
  ): Promise<void> {
    await this.mutate(() => {
      this.update(sourceId, (p) => ({
        ...p,
        postedJournals: [...p.postedJournals, journalId],
      }));
      if (ref) this.pending.push(ref);
    });
  }

  async finish(sourceId: number): Promise<void> {
    await this.mutate(() => {
      this.inFlight.delete(sourceId);
    });
  }

  /** Drops a reference once the rewrite pass has handled it. */
  async consume(ref: DeferredReference): Promise<void> {
    await this.mutate(() => {
      this.pending = this.pending.filter((r) => r !== ref);
    });
  }

  snapshot(): CheckpointData {
    const inFlight = [...this.inFlight.entries()].sort(([a], [b]) => a - b);
    return {
      inFlight: Object.fromEntries(inFlight.map(([id, p]) => [String(id), p])),
      deferred: [...this.pending],
    };
  }

  private update(
    sourceId: number,
    fn: (progress: IssueProgress) => IssueProgress
  ): void {
    const current = this.inFlight.get(sourceId);
    if (!current) throw new Error(`Redmine #${sourceId} was never started`);
    this.inFlight.set(sourceId, fn(current));
  }

  private async mutate(fn: () => void): Promise<void> {
    await this.lock.runExclusive(async () => {
      fn();
      await this.store.write(this.snapshot());
    });
  }
}
