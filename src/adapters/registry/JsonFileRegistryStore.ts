import type {
  RegistryEntries,
  RegistryStore,
} from "../../domain/ports/RegistryStore";
import { RegistryCorruptionError } from "../../domain/models/Errors";
import { readIfExists, writeFileAtomic } from "./atomicWrite";

function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

/** Serialise as a JSON object keyed by Redmine ID, keys in numeric order. */
export function serializeRegistry(entries: RegistryEntries): string {
  const sorted = [...entries].sort(([a], [b]) => a - b);
  const body = sorted.map(([s, t]) => `  "${s}": ${t}`).join(",\n");
  return sorted.length === 0 ? "{}\n" : `{\n${body}\n}\n`;
}

export function parseRegistry(text: string, origin: string): RegistryEntries {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new RegistryCorruptionError(
      `${origin} is not valid JSON: ${err instanceof Error ? err.message : err}`
    );
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new RegistryCorruptionError(`${origin} must hold a JSON object`);
  }

  return Object.entries(data).map(([key, value]): [number, number] => {
    const sourceId = Number(key);
    if (!isId(sourceId) || String(sourceId) !== key || !isId(value)) {
      throw new RegistryCorruptionError(
        `${origin} has an invalid entry "${key}": ${JSON.stringify(value)}`
      );
    }
    return [sourceId, value];
  });
}

/** Registry file on disk, replaced atomically on every write. */
export class JsonFileRegistryStore implements RegistryStore {
  constructor(private path: string) {}

  async read(): Promise<RegistryEntries | undefined> {
    const text = await readIfExists(this.path);
    return text === undefined ? undefined : parseRegistry(text, this.path);
  }

  async write(entries: RegistryEntries): Promise<void> {
    await writeFileAtomic(this.path, serializeRegistry(entries));
  }
}
