import type { CheckpointStore } from "../../domain/ports/CheckpointStore";
import type {
  CheckpointData,
  IssueProgress,
} from "../../domain/models/Checkpoint";
import type {
  DeferredReference,
  ReferenceToken,
} from "../../domain/models/PendingRelation";
import { RegistryCorruptionError } from "../../domain/models/Errors";
import { readIfExists, writeFileAtomic } from "./atomicWrite";

type Json = Record<string, unknown>;

function isRecord(v: unknown): v is Json {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isId(v: unknown): v is number {
  return typeof v === "number" && Number.isSafeInteger(v) && v > 0;
}

function toProgress(v: unknown): IssueProgress | undefined {
  if (!isRecord(v)) return undefined;
  const { bodyCaptured, labelsApplied, postedJournals } = v;
  if (typeof bodyCaptured !== "boolean" || typeof labelsApplied !== "boolean") {
    return undefined;
  }
  if (!Array.isArray(postedJournals) || !postedJournals.every(isId)) {
    return undefined;
  }
  return { bodyCaptured, labelsApplied, postedJournals };
}

function toToken(v: unknown): ReferenceToken | undefined {
  if (!isRecord(v)) return undefined;
  const { token, sourceId } = v;
  if (typeof token !== "string" || !isId(sourceId)) return undefined;
  return { token, sourceId };
}

function toDeferred(v: unknown): DeferredReference | undefined {
  if (!isRecord(v)) return undefined;
  const { repository, issueNumber, commentId, text, tokens } = v;
  if (typeof repository !== "string" || !isId(issueNumber)) return undefined;
  if (commentId !== undefined && !isId(commentId)) return undefined;
  if (typeof text !== "string" || !Array.isArray(tokens)) return undefined;

  const parsed: ReferenceToken[] = [];
  for (const t of tokens) {
    const token = toToken(t);
    if (!token) return undefined;
    parsed.push(token);
  }
  return { repository, issueNumber, commentId, text, tokens: parsed };
}

function parseJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new RegistryCorruptionError(
      `${origin} is not valid JSON: ${err instanceof Error ? err.message : err}`
    );
  }
}

export function parseCheckpoint(text: string, origin: string): CheckpointData {
  const data = parseJson(text, origin);
  if (
    !isRecord(data) ||
    !isRecord(data.inFlight) ||
    !Array.isArray(data.deferred)
  ) {
    throw new RegistryCorruptionError(
      `${origin} must hold "inFlight" and "deferred"`
    );
  }

  const inFlight: Record<string, IssueProgress> = {};
  for (const [key, value] of Object.entries(data.inFlight)) {
    const progress = toProgress(value);
    if (!isId(Number(key)) || !progress) {
      throw new RegistryCorruptionError(
        `${origin} has an invalid progress entry "${key}"`
      );
    }
    inFlight[key] = progress;
  }

  const deferred = data.deferred.map((value, i) => {
    const ref = toDeferred(value);
    if (!ref) {
      throw new RegistryCorruptionError(
        `${origin} has an invalid deferred reference at index ${i}`
      );
    }
    return ref;
  });

  return { inFlight, deferred };
}

/** Checkpoint kept next to the registry file, e.g. `id-map.json.checkpoint.json`. */
export class JsonFileCheckpointStore implements CheckpointStore {
  constructor(private path: string) {}

  static besideRegistry(registryPath: string): JsonFileCheckpointStore {
    return new JsonFileCheckpointStore(`${registryPath}.checkpoint.json`);
  }

  async read(): Promise<CheckpointData | undefined> {
    const text = await readIfExists(this.path);
    return text === undefined ? undefined : parseCheckpoint(text, this.path);
  }

  async write(data: CheckpointData): Promise<void> {
    await writeFileAtomic(this.path, JSON.stringify(data, null, 2) + "\n");
  }
}
