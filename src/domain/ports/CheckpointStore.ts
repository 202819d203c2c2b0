import type { CheckpointData } from "../models/Checkpoint";

export interface CheckpointStore {
  /** Undefined when nothing has been stored yet. */
  read(): Promise<CheckpointData | undefined>;
  write(data: CheckpointData): Promise<void>;
}
