export type RegistryEntries = Array<[sourceId: number, targetId: number]>;

export interface RegistryStore {
  /** Undefined when nothing has been stored yet. */
  read(): Promise<RegistryEntries | undefined>;
  write(entries: RegistryEntries): Promise<void>;
}
