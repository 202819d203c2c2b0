import { Mutex } from "async-mutex";
import type { RegistryEntries, RegistryStore } from "../ports/RegistryStore";
import {
  DuplicateMappingError,
  RegistryClosedError,
  RegistryCorruptionError,
} from "../models/Errors";

/**
 * Redmine issue ID → Gitea issue number. Append-only while phase 1 runs;
 * every new mapping is written through the store before `register` resolves.
 */
export class IdentifierRegistry {
  private forward = new Map<number, number>();
  private reverse = new Map<number, number>();
  private lock = new Mutex();
  private closed = false;

  constructor(private store: RegistryStore) {}

  get size(): number {
    return this.forward.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async load(): Promise<number> {
    const entries = await this.store.read();
    if (!entries) return 0;
    for (const [sourceId, targetId] of entries) {
      try {
        this.record(sourceId, targetId);
      } catch (err) {
        if (err instanceof DuplicateMappingError) {
          throw new RegistryCorruptionError(`Stored registry: ${err.message}`);
        }
        throw err;
      }
    }
    return entries.length;
  }

  /** Returns true when the mapping is new. */
  record(sourceId: number, targetId: number): boolean {
    if (this.closed) throw new RegistryClosedError(sourceId);

    const existing = this.forward.get(sourceId);
    if (existing !== undefined) {
      if (existing === targetId) return false;
      throw new DuplicateMappingError(
        sourceId,
        targetId,
        `already mapped to #${existing}`
      );
    }
    const claimedBy = this.reverse.get(targetId);
    if (claimedBy !== undefined) {
      throw new DuplicateMappingError(
        sourceId,
        targetId,
        `target already claimed by Redmine #${claimedBy}`
      );
    }

    this.forward.set(sourceId, targetId);
    this.reverse.set(targetId, sourceId);
    return true;
  }

  resolve(sourceId: number): number | undefined {
    return this.forward.get(sourceId);
  }

  entries(): RegistryEntries {
    return [...this.forward.entries()].sort(([a], [b]) => a - b);
  }

  async persist(): Promise<void> {
    await this.store.write(this.entries());
  }

  /** `record` followed by `persist`, serialised against concurrent callers. */
  async register(sourceId: number, targetId: number): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.record(sourceId, targetId)) await this.persist();
    });
  }

  close(): void {
    this.closed = true;
  }
}
